/**
 * DuckDB Tooling
 * Catalog lookup, schema description, plan explanation and benchmarking over one
 * read-only connection. Every operation resolves to `{ ok, ... }`; failures are data.
 */

import { performance } from 'node:perf_hooks';
import type {
  BenchmarkRecord,
  ColumnInfo,
  DescribeQualifiedResult,
  DescribeUnqualifiedResult,
  ExplainAnalyzeResult,
  ExplainResult,
  ListTablesResult,
  RowCountResult,
  SqlTooling,
  TableExistsResult,
  ToolFailure,
} from '../agent-types.js';
import { logger } from '../logger.js';
import { DuckDBEngine, type DuckDBEnv, type QueryEngine, type SqlRow } from './duckdb-engine.js';
import { guardReadOnly, isPlainIdentifier } from './sql-guard.js';

const TOTAL_TIME_RE = /Total Time:\s*([0-9.]+)s/i;

export interface ToolingOptions {
  /** Millisecond clock used for client-side timing. */
  now?: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function splitQualified(name: string): [string, string] | null {
  const dot = name.indexOf('.');
  if (dot === -1) return null;
  return [name.slice(0, dot), name.slice(dot + 1)];
}

/** EXPLAIN rows come back as (explain_key, explain_value). */
function planText(rows: SqlRow[]): string {
  return rows
    .map((row) => String(row.explain_value ?? Object.values(row)[1] ?? ''))
    .join('\n');
}

export class DuckDBTooling implements SqlTooling {
  private engine: QueryEngine;
  private now: () => number;

  constructor(engine: QueryEngine, options: ToolingOptions = {}) {
    this.engine = engine;
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Open a DuckDB file (read-only by default) and make EXPLAIN output complete.
   */
  static async connect(env: DuckDBEnv): Promise<DuckDBTooling> {
    const engine = await DuckDBEngine.open(env);
    try {
      await engine.all("SET explain_output='all';");
    } catch (error) {
      logger.warn(`Could not set explain_output: ${errorMessage(error)}`);
    }
    return new DuckDBTooling(engine);
  }

  async close(): Promise<void> {
    await this.engine.close();
  }

  // ---------- basic catalog ----------

  async listTables(): Promise<ListTablesResult | ToolFailure> {
    try {
      const rows = await this.engine.all(`
        SELECT table_schema, table_name, table_type
        FROM information_schema.tables
        WHERE table_schema NOT IN ('information_schema', 'pg_catalog')
        ORDER BY table_schema, table_name
      `);
      return {
        ok: true,
        tables: rows.map((row) => ({
          schema: String(row.table_schema),
          name: String(row.table_name),
          type: String(row.table_type),
        })),
      };
    } catch (error) {
      return { ok: false, error: `list_tables failed: ${errorMessage(error)}` };
    }
  }

  /**
   * Accepts `schema.table` (matched on both columns) or a bare `table` (matched in any schema).
   */
  async tableExists(name: string): Promise<TableExistsResult | ToolFailure> {
    try {
      const qualified = splitQualified(name);
      const rows = qualified
        ? await this.engine.all(
            `SELECT COUNT(*) AS n FROM information_schema.tables
             WHERE table_schema=? AND table_name=?`,
            qualified
          )
        : await this.engine.all(
            `SELECT COUNT(*) AS n FROM information_schema.tables
             WHERE table_name=?`,
            [name]
          );
      return { ok: true, name, exists: Number(rows[0]?.n ?? 0) > 0 };
    } catch (error) {
      return { ok: false, error: `table_exists failed: ${errorMessage(error)}`, name };
    }
  }

  /**
   * Columns and types from information_schema.columns. A bare name may match
   * several schemas, so the result is grouped by schema.
   */
  async describeRelation(
    name: string,
    sampleCols: number = 200
  ): Promise<DescribeQualifiedResult | DescribeUnqualifiedResult | ToolFailure> {
    try {
      const qualified = splitQualified(name);

      if (qualified) {
        const rows = await this.engine.all(
          `SELECT column_name, data_type
           FROM information_schema.columns
           WHERE table_schema=? AND table_name=?
           ORDER BY ordinal_position`,
          qualified
        );
        if (rows.length === 0) {
          return { ok: false, error: `Relation not found in catalog: ${name}` };
        }
        const columns: ColumnInfo[] = rows.slice(0, sampleCols).map((row) => ({
          name: String(row.column_name),
          type: String(row.data_type),
        }));
        return { ok: true, relation: name, columns, num_columns: rows.length };
      }

      const rows = await this.engine.all(
        `SELECT table_schema, column_name, data_type
         FROM information_schema.columns
         WHERE table_name=?
         ORDER BY table_schema, ordinal_position`,
        [name]
      );
      if (rows.length === 0) {
        return { ok: false, error: `Relation not found in catalog: ${name}` };
      }

      const schemas: Record<string, ColumnInfo[]> = {};
      for (const row of rows.slice(0, sampleCols)) {
        const schema = String(row.table_schema);
        (schemas[schema] ??= []).push({ name: String(row.column_name), type: String(row.data_type) });
      }
      return { ok: true, relation: name, schemas, num_columns: rows.length };
    } catch (error) {
      return { ok: false, error: `describe_relation failed: ${errorMessage(error)}` };
    }
  }

  /**
   * Potentially expensive. Use sparingly.
   */
  async rowCount(name: string, timeoutS: number = 30): Promise<RowCountResult | ToolFailure> {
    if (!isPlainIdentifier(name)) {
      return { ok: false, error: `row_count expects a table or schema.table identifier, got: ${name}` };
    }
    const started = this.now();
    try {
      const rows = await this.engine.all(`SELECT COUNT(*) AS n FROM ${name}`);
      const elapsed = this.now() - started;
      if (elapsed > timeoutS * 1000) {
        return { ok: false, error: `row_count exceeded timeout ${timeoutS}s`, elapsed_ms: elapsed };
      }
      return { ok: true, value: Number(rows[0]?.n ?? 0), elapsed_ms: elapsed };
    } catch (error) {
      return { ok: false, error: `row_count failed: ${errorMessage(error)}` };
    }
  }

  // ---------- explain / eval ----------

  async explain(sql: string): Promise<ExplainResult | ToolFailure> {
    const guarded = guardReadOnly(sql);
    if (!guarded.ok) {
      return { ok: false, error: `EXPLAIN failed: ${guarded.error}` };
    }
    try {
      const rows = await this.engine.all(`EXPLAIN ${guarded.sql}`);
      return { ok: true, plan: planText(rows) };
    } catch (error) {
      return { ok: false, error: `EXPLAIN failed: ${errorMessage(error)}` };
    }
  }

  /**
   * Runs EXPLAIN ANALYZE, which executes the query and returns plan + timing
   * without returning the result set. The timeout is checked after the call
   * returns; a running statement is not interrupted.
   */
  async explainAnalyze(sql: string, timeoutS: number = 60): Promise<ExplainAnalyzeResult | ToolFailure> {
    const guarded = guardReadOnly(sql);
    if (!guarded.ok) {
      return { ok: false, error: `EXPLAIN ANALYZE failed: ${guarded.error}` };
    }
    try {
      const started = this.now();
      const rows = await this.engine.all(`EXPLAIN ANALYZE ${guarded.sql}`);
      const elapsed = this.now() - started;

      if (elapsed > timeoutS * 1000) {
        return { ok: false, error: `EXPLAIN ANALYZE exceeded timeout ${timeoutS}s`, elapsed_ms: elapsed };
      }

      const analyze = planText(rows);
      const match = analyze.match(TOTAL_TIME_RE);
      return {
        ok: true,
        elapsed_ms_client: elapsed,
        total_time_s_explain: match ? parseFloat(match[1]) : null,
        analyze,
      };
    } catch (error) {
      return { ok: false, error: `EXPLAIN ANALYZE failed: ${errorMessage(error)}` };
    }
  }

  /**
   * Benchmarks using EXPLAIN ANALYZE as the measurement primitive.
   * Returns the median of client-measured elapsed ms and keeps one analyze text.
   */
  async benchmark(
    sql: string,
    runs: number = 3,
    warmup: number = 1,
    timeoutS: number = 60
  ): Promise<BenchmarkRecord | ToolFailure> {
    const times: number[] = [];
    let lastAnalyze: string | null = null;
    let lastTotalS: number | null = null;

    for (let i = 0; i < warmup; i++) {
      const result = await this.explainAnalyze(sql, timeoutS);
      if (!result.ok) return { ok: false, error: result.error };
    }

    for (let i = 0; i < runs; i++) {
      const result = await this.explainAnalyze(sql, timeoutS);
      if (!result.ok) return { ok: false, error: result.error };
      times.push(result.elapsed_ms_client);
      lastAnalyze = result.analyze;
      lastTotalS = result.total_time_s_explain;
    }

    if (times.length === 0) {
      return { ok: false, error: 'benchmark requires at least one measured run' };
    }

    const sorted = [...times].sort((a, b) => a - b);
    return {
      ok: true,
      runs,
      warmup,
      elapsed_ms: times,
      median_ms: sorted[Math.floor(sorted.length / 2)],
      plan_sample: lastAnalyze,
      total_time_s_sample: lastTotalS,
    };
  }
}
