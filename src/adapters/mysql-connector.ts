/**
 * MySQL connector
 */

import type { DbConnector, SqlExecutor, SqlSession } from '../interfaces';
import type { ColumnInfo, ConnectionParams, RecordBatch, SqlParam } from '../types';
import { ENGINE } from '../enums';
import { ConnectionError, QueryError, errorMessage } from '../errors';
import {
  columnsOf,
  identityValues,
  isRecord,
  quoteIdentifier,
  resolveSyncColumns,
  splitHostPort,
  toRows,
} from '../utils';

export interface MySqlConnectionOptions {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectTimeout: number;
}

export type MySqlConnect = (options: MySqlConnectionOptions) => Promise<SqlSession>;

const quote = (name: string): string => quoteIdentifier(name, '`');

function affectedRows(result: unknown): number {
  return isRecord(result) && typeof result.affectedRows === 'number' ? result.affectedRows : 0;
}

/**
 * Open a connection with mysql2; the driver is loaded on first use
 */
export const connectMySql: MySqlConnect = async options => {
  const { createConnection } = await import('mysql2/promise');
  const connection = await createConnection(options);

  const executor: SqlExecutor = {
    async query(sql, params = []) {
      const [rows]: [unknown, unknown] = await connection.query(sql, [...params]);
      return Array.isArray(rows) ? rows.filter(isRecord) : [];
    },
    async execute(sql, params = []) {
      const [result] = await connection.execute(sql, [...params]);
      return affectedRows(result);
    },
  };

  return {
    ...executor,
    async transaction(work) {
      await connection.beginTransaction();
      try {
        const result = await work(executor);
        await connection.commit();
        return result;
      } catch (error) {
        await connection.rollback();
        throw error;
      }
    },
    close: () => connection.end(),
  };
};

export class MySqlConnector implements DbConnector {
  readonly engine = ENGINE.MYSQL;
  private session: SqlSession | null = null;

  constructor(
    private readonly params: ConnectionParams,
    private readonly connect: MySqlConnect = connectMySql,
  ) {}

  async open(): Promise<void> {
    if (this.session) return;

    const { host, port } = splitHostPort(this.params.host);
    try {
      this.session = await this.connect({
        host,
        port: port ?? 3306,
        database: this.params.database,
        user: this.params.user,
        password: this.params.password,
        connectTimeout: this.params.connectTimeoutMs ?? 5000,
      });
    } catch (error) {
      throw new ConnectionError(this.engine, errorMessage(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await session.close();
  }

  async listTables(): Promise<string[]> {
    const rows = await this.query(
      'information_schema',
      `SELECT TABLE_NAME AS name FROM information_schema.TABLES
       WHERE TABLE_SCHEMA = DATABASE() AND TABLE_TYPE = 'BASE TABLE' ORDER BY TABLE_NAME`,
    );
    return rows.map(row => String(row.name));
  }

  async listColumns(table: string): Promise<string[]> {
    return (await this.describe(table)).map(column => column.name);
  }

  async readTable(table: string, columns: string[]): Promise<RecordBatch> {
    const rows = toRows(await this.query(table, `SELECT ${this.projection(columns)} FROM ${quote(table)}`));
    return { table, columns: columnsOf(columns, rows), rows };
  }

  async readUnsynced(table: string, columns: string[]): Promise<RecordBatch> {
    const sync = resolveSyncColumns(table, await this.listColumns(table));

    let sql = `SELECT ${this.projection(columns)} FROM ${quote(table)}`;
    if (sync) {
      sql += ` WHERE COALESCE(${quote(sync.flag)}, 0) = 0`;
    }

    const rows = toRows(await this.query(table, sql));
    return { table, columns: columnsOf(columns, rows), rows };
  }

  async markSynced(table: string, batch: RecordBatch): Promise<void> {
    if (batch.rows.length === 0) return;

    const sync = resolveSyncColumns(table, await this.listColumns(table));
    if (!sync) return;

    const ids = identityValues(table, batch.rows, sync.identity);
    const sql = `UPDATE ${quote(table)} SET ${quote(sync.flag)} = 1 WHERE ${quote(sync.identity)} = ?`;
    const session = await this.ready();

    try {
      await session.transaction(async tx => {
        for (const id of ids) {
          await tx.execute(sql, [id]);
        }
      });
    } catch (error) {
      throw new QueryError(this.engine, table, errorMessage(error), { cause: error });
    }
  }

  private async describe(table: string): Promise<ColumnInfo[]> {
    const rows = await this.query(
      table,
      `SELECT COLUMN_NAME AS name, DATA_TYPE AS type FROM information_schema.COLUMNS
       WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ? ORDER BY ORDINAL_POSITION`,
      [table],
    );
    return rows.map(row => ({ name: String(row.name), type: String(row.type) }));
  }

  private projection(columns: readonly string[]): string {
    return columns.length > 0 ? columns.map(quote).join(', ') : '*';
  }

  private async ready(): Promise<SqlSession> {
    await this.open();
    if (!this.session) {
      throw new ConnectionError(this.engine, 'connection is not open');
    }
    return this.session;
  }

  private async query(table: string, sql: string, params: SqlParam[] = []): Promise<Record<string, unknown>[]> {
    const session = await this.ready();
    try {
      return await session.query(sql, params);
    } catch (error) {
      throw new QueryError(this.engine, table, errorMessage(error), { cause: error });
    }
  }
}
