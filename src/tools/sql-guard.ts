/**
 * SQL Guard
 * Cleans SQL handed over by the model and rejects anything that is not a single read-only query.
 * EXPLAIN ANALYZE executes its statement, so every tool that reaches the engine goes through here.
 */

const READ_ONLY_LEADING_KEYWORDS = ['select', 'with', 'from', 'values', 'table'];

const IDENTIFIER_RE = /^[A-Za-z_][\w$]*(\.[A-Za-z_][\w$]*)?$/;

/** Quoted text first, so comment markers inside literals and identifiers stay put. */
const QUOTED_OR_COMMENT_RE = /'(?:[^']|'')*'|"(?:[^"]|"")*"|--[^\n]*|\/\*[\s\S]*?\*\//g;

export type GuardResult = { ok: true; sql: string } | { ok: false; error: string };

/**
 * Strip markdown fences, comments and trailing semicolons.
 */
export function cleanSQL(sql: string): string {
  return sql
    .replace(/```(sql)?/gi, '')
    .replace(QUOTED_OR_COMMENT_RE, (token) => (token.startsWith('--') || token.startsWith('/*') ? '' : token))
    .trim()
    .replace(/(;\s*)+$/, '')
    .trim();
}

/**
 * Remove quoted literals and identifiers so keyword and separator checks
 * do not trip over text inside strings.
 */
function stripQuoted(sql: string): string {
  return sql.replace(/'(?:[^']|'')*'/g, "''").replace(/"(?:[^"]|"")*"/g, '""');
}

export function guardReadOnly(sql: string): GuardResult {
  const cleaned = cleanSQL(sql);

  if (!cleaned) {
    return { ok: false, error: 'Empty SQL query after cleaning' };
  }

  const unquoted = stripQuoted(cleaned);
  if (unquoted.includes(';')) {
    return { ok: false, error: 'Only a single SQL statement is allowed' };
  }

  const leading = (unquoted.replace(/^[\s(]+/, '').match(/^[A-Za-z]+/)?.[0] ?? '').toLowerCase();
  if (!READ_ONLY_LEADING_KEYWORDS.includes(leading)) {
    return {
      ok: false,
      error: `Only read-only queries are allowed (statement starts with "${leading.toUpperCase()}")`,
    };
  }

  return { ok: true, sql: cleaned };
}

export function isPlainIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}
