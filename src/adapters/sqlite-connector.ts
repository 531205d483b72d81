/**
 * SQLite connector for local database files
 */

import Database from 'better-sqlite3';
import type { DbConnector } from '../interfaces';
import type { ColumnInfo, RecordBatch, SqlParam } from '../types';
import { ENGINE } from '../enums';
import { ConnectionError, QueryError, errorMessage } from '../errors';
import {
  columnsOf,
  identityValues,
  isRecord,
  quoteIdentifier,
  resolveSyncColumns,
  toRows,
} from '../utils';

export interface SqliteConnectorOptions {
  timeoutMs?: number; // How long to wait on a locked file
}

const quote = (name: string): string => quoteIdentifier(name, '"');

// better-sqlite3 binds numbers, strings, bigints, buffers and null only
function toSqliteParam(value: SqlParam): string | number | bigint | null {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

export class SqliteConnector implements DbConnector {
  readonly engine = ENGINE.SQLITE;
  private db: Database.Database | null = null;

  constructor(
    private readonly filePath: string,
    private readonly options: SqliteConnectorOptions = {},
  ) {}

  async open(): Promise<void> {
    if (this.db?.open) return;

    try {
      this.db = new Database(this.filePath, {
        fileMustExist: true,
        timeout: this.options.timeoutMs ?? 5000,
      });
    } catch (error) {
      throw new ConnectionError(this.engine, errorMessage(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!this.db) return;
    if (this.db.open) this.db.close();
    this.db = null;
  }

  async listTables(): Promise<string[]> {
    await this.open();
    const rows = this.all(
      'sqlite_master',
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    );
    return rows.map(row => String(row.name));
  }

  async listColumns(table: string): Promise<string[]> {
    await this.open();
    return this.describe(table).map(column => column.name);
  }

  async readTable(table: string, columns: string[]): Promise<RecordBatch> {
    await this.open();
    const sql = `SELECT ${this.projection(columns)} FROM ${quote(table)}`;
    const rows = toRows(this.all(table, sql));
    return { table, columns: columnsOf(columns, rows), rows };
  }

  async readUnsynced(table: string, columns: string[]): Promise<RecordBatch> {
    const sync = resolveSyncColumns(table, await this.listColumns(table));

    let sql = `SELECT ${this.projection(columns)} FROM ${quote(table)}`;
    if (sync) {
      sql += ` WHERE COALESCE(${quote(sync.flag)}, 0) = 0`;
    }

    const rows = toRows(this.all(table, sql));
    return { table, columns: columnsOf(columns, rows), rows };
  }

  async markSynced(table: string, batch: RecordBatch): Promise<void> {
    if (batch.rows.length === 0) return;

    const sync = resolveSyncColumns(table, await this.listColumns(table));
    if (!sync) return;

    const ids = identityValues(table, batch.rows, sync.identity);
    const db = this.connection();

    try {
      const update = db.prepare(
        `UPDATE ${quote(table)} SET ${quote(sync.flag)} = 1 WHERE ${quote(sync.identity)} = ?`,
      );
      const markAll = db.transaction((values: SqlParam[]) => {
        for (const value of values) {
          update.run(toSqliteParam(value));
        }
      });
      markAll(ids);
    } catch (error) {
      throw new QueryError(this.engine, table, errorMessage(error), { cause: error });
    }
  }

  private describe(table: string): ColumnInfo[] {
    const rows = this.all(table, 'SELECT name, type FROM pragma_table_info(?) ORDER BY cid', [table]);
    return rows.map(row => ({ name: String(row.name), type: String(row.type ?? '') }));
  }

  private projection(columns: readonly string[]): string {
    return columns.length > 0 ? columns.map(quote).join(', ') : '*';
  }

  private connection(): Database.Database {
    if (!this.db?.open) {
      throw new ConnectionError(this.engine, `connection to ${this.filePath} is not open`);
    }
    return this.db;
  }

  private all(table: string, sql: string, params: SqlParam[] = []): Record<string, unknown>[] {
    const db = this.connection();
    try {
      return db
        .prepare(sql)
        .all(...params.map(toSqliteParam))
        .filter(isRecord);
    } catch (error) {
      throw new QueryError(this.engine, table, errorMessage(error), { cause: error });
    }
  }
}
