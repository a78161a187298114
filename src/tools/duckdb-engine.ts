/**
 * DuckDB query engine
 * Owns the single database connection used by the tool provider.
 */

import { DuckDBInstance } from '@duckdb/node-api';
import type { DuckDBConnection } from '@duckdb/node-api';

export type SqlRow = Record<string, unknown>;

export interface QueryEngine {
  all(sql: string, params?: string[]): Promise<SqlRow[]>;
  close(): Promise<void>;
}

export interface DuckDBEnv {
  dbPath: string;
  readOnly: boolean;
}

export class DuckDBEngine implements QueryEngine {
  private instance: DuckDBInstance;
  private connection: DuckDBConnection;

  private constructor(instance: DuckDBInstance, connection: DuckDBConnection) {
    this.instance = instance;
    this.connection = connection;
  }

  /**
   * Open the database file. With `readOnly` the file is opened in READ_ONLY
   * access mode, so no statement can change persisted data.
   */
  static async open(env: DuckDBEnv): Promise<DuckDBEngine> {
    const instance = await DuckDBInstance.create(
      env.dbPath,
      env.readOnly ? { access_mode: 'READ_ONLY' } : {}
    );
    const connection = await instance.connect();
    return new DuckDBEngine(instance, connection);
  }

  async all(sql: string, params: string[] = []): Promise<SqlRow[]> {
    const reader = params.length > 0
      ? await this.connection.runAndReadAll(sql, params)
      : await this.connection.runAndReadAll(sql);
    return reader.getRowObjectsJson();
  }

  async close(): Promise<void> {
    this.connection.closeSync();
    this.instance.closeSync();
  }
}
