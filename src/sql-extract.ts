/**
 * Helpers for pulling SQL out of model text and relation names out of SQL.
 */

const SQL_BLOCK_RE = /```sql\s*([\s\S]*?)```/i;

const TABLE_REF_RE = /(?:from|join)\s+(?:([a-zA-Z_]\w*)\.)?([a-zA-Z_]\w*)/gi;

/**
 * First fenced ```sql block; otherwise the whole text if it looks like SQL.
 */
export function extractSqlFromModel(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }
  const match = text.match(SQL_BLOCK_RE);
  if (match) {
    return match[1].trim() || null;
  }
  if (/\bselect\b/i.test(text)) {
    return text.trim();
  }
  return null;
}

/**
 * FROM/JOIN identifiers as `schema.table` or `table`, de-duplicated in first-seen order.
 * Quoted identifiers and subquery aliases are not recognised.
 */
export function extractTableRefs(sql: string): string[] {
  const refs = new Set<string>();
  for (const match of sql.matchAll(TABLE_REF_RE)) {
    const [, schema, table] = match;
    refs.add(schema ? `${schema}.${table}` : table);
  }
  return Array.from(refs);
}
