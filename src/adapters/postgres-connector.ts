/**
 * PostgreSQL connector, limited to the `public` schema
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

export interface PostgresConnectionOptions {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectionTimeoutMillis: number;
}

export type PostgresConnect = (options: PostgresConnectionOptions) => Promise<SqlSession>;

const quote = (name: string): string => quoteIdentifier(name, '"');

/**
 * Open a connection with pg; the driver is loaded on first use
 */
export const connectPostgres: PostgresConnect = async options => {
  const { default: pg } = await import('pg');
  const client = new pg.Client(options);
  await client.connect();

  const executor: SqlExecutor = {
    async query(sql, params = []) {
      const result = await client.query(sql, [...params]);
      const rows: unknown[] = result.rows;
      return rows.filter(isRecord);
    },
    async execute(sql, params = []) {
      const result = await client.query(sql, [...params]);
      return result.rowCount ?? 0;
    },
  };

  return {
    ...executor,
    async transaction(work) {
      await client.query('BEGIN');
      try {
        const result = await work(executor);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    },
    close: () => client.end(),
  };
};

export class PostgresConnector implements DbConnector {
  readonly engine = ENGINE.POSTGRES;
  private session: SqlSession | null = null;

  constructor(
    private readonly params: ConnectionParams,
    private readonly connect: PostgresConnect = connectPostgres,
  ) {}

  async open(): Promise<void> {
    if (this.session) return;

    const { host, port } = splitHostPort(this.params.host);
    try {
      this.session = await this.connect({
        host,
        port: port ?? 5432,
        database: this.params.database,
        user: this.params.user,
        password: this.params.password,
        connectionTimeoutMillis: this.params.connectTimeoutMs ?? 5000,
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
      `SELECT table_name AS name FROM information_schema.tables
       WHERE table_schema = 'public' AND table_type = 'BASE TABLE' ORDER BY table_name`,
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
    const described = await this.describe(table);
    const sync = resolveSyncColumns(table, described.map(column => column.name));

    let sql = `SELECT ${this.projection(columns)} FROM ${quote(table)}`;
    if (sync) {
      sql += this.isBoolean(described, sync.flag)
        ? ` WHERE ${quote(sync.flag)} IS NOT TRUE`
        : ` WHERE COALESCE(${quote(sync.flag)}, 0) = 0`;
    }

    const rows = toRows(await this.query(table, sql));
    return { table, columns: columnsOf(columns, rows), rows };
  }

  async markSynced(table: string, batch: RecordBatch): Promise<void> {
    if (batch.rows.length === 0) return;

    const described = await this.describe(table);
    const sync = resolveSyncColumns(table, described.map(column => column.name));
    if (!sync) return;

    const ids = identityValues(table, batch.rows, sync.identity);
    const syncedValue = this.isBoolean(described, sync.flag) ? 'TRUE' : '1';
    const sql = `UPDATE ${quote(table)} SET ${quote(sync.flag)} = ${syncedValue} WHERE ${quote(sync.identity)} = $1`;
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

  private isBoolean(columns: readonly ColumnInfo[], name: string): boolean {
    return columns.find(column => column.name === name)?.type.toLowerCase() === 'boolean';
  }

  private async describe(table: string): Promise<ColumnInfo[]> {
    const rows = await this.query(
      table,
      `SELECT column_name AS name, data_type AS type FROM information_schema.columns
       WHERE table_schema = 'public' AND table_name = $1 ORDER BY ordinal_position`,
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
