/**
 * SQL Server connector
 */

import type { config as MssqlConfig, ConnectionPool, Request } from 'mssql';
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

export interface SqlServerConnectionOptions {
  server: string;
  port?: number;
  instanceName?: string;
  database: string;
  user?: string;
  password?: string;
  trustedConnection: boolean;
  connectionTimeout: number;
}

export type SqlServerConnect = (options: SqlServerConnectionOptions) => Promise<SqlSession>;

const quote = (name: string): string => quoteIdentifier(name, '[', ']');

/**
 * Parse `server`, `server:port`, `server\instance` or `.\instance`
 */
export function parseSqlServerHost(host: string): { server: string; port?: number; instanceName?: string } {
  const [serverPart = '', instanceName] = host.trim().split('\\');
  const { host: name, port } = splitHostPort(serverPart);
  const server = name === '.' || name === '' ? 'localhost' : name;

  if (instanceName) return { server, instanceName };
  return port === undefined ? { server } : { server, port };
}

async function runRequest(request: Request, sql: string, params: readonly SqlParam[]) {
  params.forEach((value, index) => {
    request.input(`p${index}`, value);
  });
  return request.query(sql);
}

function executorFor(createRequest: () => Request): SqlExecutor {
  return {
    async query(sql, params = []) {
      const result = await runRequest(createRequest(), sql, params);
      const rows: unknown[] = result.recordset ?? [];
      return rows.filter(isRecord);
    },
    async execute(sql, params = []) {
      const result = await runRequest(createRequest(), sql, params);
      return result.rowsAffected.reduce((total, count) => total + count, 0);
    },
  };
}

/**
 * Open a connection pool with mssql; the driver is loaded on first use
 */
export const connectSqlServer: SqlServerConnect = async options => {
  const { default: mssql } = await import('mssql');

  const config: MssqlConfig = {
    server: options.server,
    database: options.database,
    connectionTimeout: options.connectionTimeout,
    options: {
      encrypt: false,
      trustServerCertificate: true,
      trustedConnection: options.trustedConnection,
      ...(options.instanceName ? { instanceName: options.instanceName } : {}),
    },
    ...(options.port === undefined ? {} : { port: options.port }),
    ...(options.trustedConnection ? {} : { user: options.user, password: options.password }),
  };

  const pool: ConnectionPool = await new mssql.ConnectionPool(config).connect();
  const executor = executorFor(() => pool.request());

  return {
    ...executor,
    async transaction(work) {
      const transaction = new mssql.Transaction(pool);
      await transaction.begin();
      try {
        const result = await work(executorFor(() => transaction.request()));
        await transaction.commit();
        return result;
      } catch (error) {
        await transaction.rollback();
        throw error;
      }
    },
    close: () => pool.close(),
  };
};

export class SqlServerConnector implements DbConnector {
  readonly engine = ENGINE.SQL_SERVER;
  private session: SqlSession | null = null;

  constructor(
    private readonly params: ConnectionParams,
    private readonly connect: SqlServerConnect = connectSqlServer,
  ) {}

  async open(): Promise<void> {
    if (this.session) return;

    const integrated = this.params.integratedSecurity;
    try {
      this.session = await this.connect({
        ...parseSqlServerHost(this.params.host),
        database: this.params.database,
        trustedConnection: integrated,
        connectionTimeout: this.params.connectTimeoutMs ?? 5000,
        ...(integrated ? {} : { user: this.params.user, password: this.params.password }),
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
      'INFORMATION_SCHEMA',
      `SELECT TABLE_NAME AS name FROM INFORMATION_SCHEMA.TABLES
       WHERE TABLE_TYPE = 'BASE TABLE' AND TABLE_CATALOG = DB_NAME() ORDER BY TABLE_NAME`,
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
    const sql = `UPDATE ${quote(table)} SET ${quote(sync.flag)} = 1 WHERE ${quote(sync.identity)} = @p0`;
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
      `SELECT COLUMN_NAME AS name, DATA_TYPE AS type FROM INFORMATION_SCHEMA.COLUMNS
       WHERE TABLE_NAME = @p0 ORDER BY ORDINAL_POSITION`,
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
