/**
 * Finds the engine behind a host string and opens a connector to it
 */

import { existsSync } from 'node:fs';
import type { DbConnector } from './interfaces';
import type { ConnectionParams } from './types';
import {
  ConnectionError,
  EmptyDatabaseError,
  NoUsableDatabaseError,
  NotFoundError,
  SyncError,
  errorMessage,
} from './errors';
import { ENGINE_LABEL } from './enums';
import { errorFields, logger as defaultLogger, type Logger } from './logger';
import { MySqlConnector } from './adapters/mysql-connector';
import { PostgresConnector } from './adapters/postgres-connector';
import { SqliteConnector } from './adapters/sqlite-connector';
import { SqlServerConnector } from './adapters/sqlserver-connector';

export const FILE_DATABASE_SUFFIXES = ['.sqlite', '.db'] as const;

export type ConnectorFactory = (params: ConnectionParams) => DbConnector;

// Probe order for network hosts
export const DEFAULT_SERVER_CANDIDATES: readonly ConnectorFactory[] = [
  params => new SqlServerConnector(params),
  params => new MySqlConnector(params),
  params => new PostgresConnector(params),
];

export interface ConnectionResolverOptions {
  candidates?: readonly ConnectorFactory[];
  createFileConnector?: ConnectorFactory;
  fileExists?: (path: string) => boolean;
  logger?: Logger;
}

export function isFileDatabase(host: string): boolean {
  const normalized = host.trim().toLowerCase();
  return FILE_DATABASE_SUFFIXES.some(suffix => normalized.endsWith(suffix));
}

export class ConnectionResolver {
  private readonly candidates: readonly ConnectorFactory[];
  private readonly createFileConnector: ConnectorFactory;
  private readonly fileExists: (path: string) => boolean;
  private readonly logger: Logger;

  constructor(options: ConnectionResolverOptions = {}) {
    this.candidates = options.candidates ?? DEFAULT_SERVER_CANDIDATES;
    this.createFileConnector =
      options.createFileConnector ??
      (params => new SqliteConnector(params.host.trim(), { timeoutMs: params.connectTimeoutMs ?? 5000 }));
    this.fileExists = options.fileExists ?? existsSync;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Return an open connector with at least one table
   */
  async resolve(params: ConnectionParams): Promise<DbConnector> {
    return isFileDatabase(params.host) ? this.openFile(params) : this.probe(params);
  }

  private async openFile(params: ConnectionParams): Promise<DbConnector> {
    const path = params.host.trim();
    if (!this.fileExists(path)) {
      throw new NotFoundError(path);
    }

    const connector = this.createFileConnector(params);
    try {
      await connector.open();
      const tables = await connector.listTables();
      if (tables.length === 0) {
        throw new EmptyDatabaseError(connector.engine, path);
      }
      this.logger.info('Connected to database file', { engine: connector.engine, path, tables: tables.length });
      return connector;
    } catch (error) {
      await this.dispose(connector);
      throw this.toSyncError(connector, error);
    }
  }

  private async probe(params: ConnectionParams): Promise<DbConnector> {
    const errors: SyncError[] = [];

    for (const create of this.candidates) {
      const connector = create(params);
      const label = ENGINE_LABEL[connector.engine];

      try {
        await connector.open();
        const tables = await connector.listTables();
        if (tables.length > 0) {
          this.logger.info('Connected to database server', { engine: connector.engine, host: params.host, tables: tables.length });
          return connector;
        }
        this.logger.info(`${label} connection has no tables, trying next engine`, { engine: connector.engine });
      } catch (error) {
        this.logger.debug(`${label} connection failed`, { engine: connector.engine, error: errorFields(error) });
        errors.push(this.toSyncError(connector, error));
      }

      await this.dispose(connector);
    }

    const [first] = errors;
    if (first) {
      throw first;
    }
    throw new NoUsableDatabaseError(params.host);
  }

  private toSyncError(connector: DbConnector, error: unknown): SyncError {
    if (error instanceof SyncError) return error;
    return new ConnectionError(connector.engine, errorMessage(error), { cause: error });
  }

  private async dispose(connector: DbConnector): Promise<void> {
    try {
      await connector.close();
    } catch (error) {
      this.logger.warn('Failed to close connector', { engine: connector.engine, error: errorFields(error) });
    }
  }
}
