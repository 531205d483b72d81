/**
 * Main SyncEngine class that orchestrates sync runs
 */

import type { ApiClient, CredentialProvider, DbConnector, EventEmitter, SyncEvents } from './interfaces';
import type { RecordBatch, SyncRunResult, TableName, TableReport, WireRecord } from './types';
import { ENTITY, RUN_STATUS, RUN_TRIGGER, SKIP_REASON, SYNC_EVENT } from './enums';
import { SyncError, SyncFailure, TransformationError, errorMessage } from './errors';
import { errorFields, logger as defaultLogger, type Logger } from './logger';
import { ENTITY_TABLE, parseEntityList, type EntityRecord } from './models';
import { SyncEventEmitter } from './event-emitter';
import { SessionManager } from './session';
import { TABLES, orderTables } from './tables';
import { RowTransformer } from './transformer';

export const DEFAULT_SYNC_INTERVAL_MS = 10 * 60_000;

export interface SyncEngineConfig {
  connector: DbConnector;
  api: ApiClient;
  credentialProvider: CredentialProvider;

  // Configuration options
  tables?: string[]; // Default selection for timer-driven runs
  syncInterval?: number; // Auto-sync interval in ms (0 to disable)
  tokenLifetimeMs?: number; // Estimated token validity
  transformer?: RowTransformer;
  logger?: Logger;
  clock?: () => number;
}

type TableOutcome = { report: TableReport; error?: SyncError };

/**
 * Moves unsynced local rows to the remote API, one table at a time in
 * dependency order. At most one run is active at any moment.
 */
export class SyncEngine implements EventEmitter {
  private readonly connector: DbConnector;
  private readonly api: ApiClient;
  private readonly transformer: RowTransformer;
  private readonly session: SessionManager;
  private readonly eventEmitter: SyncEventEmitter;
  private readonly logger: Logger;
  private readonly syncInterval: number;

  // State
  private isSyncing = false;
  private selection: string[];
  private syncTimer: NodeJS.Timeout | undefined;

  constructor(config: SyncEngineConfig) {
    this.connector = config.connector;
    this.api = config.api;
    this.logger = config.logger ?? defaultLogger;
    this.transformer = config.transformer ?? new RowTransformer();
    this.syncInterval = config.syncInterval ?? DEFAULT_SYNC_INTERVAL_MS;
    this.selection = [...(config.tables ?? [])];
    this.eventEmitter = new SyncEventEmitter(this.logger);

    this.session = new SessionManager({
      api: config.api,
      credentialProvider: config.credentialProvider,
      logger: this.logger,
      onStateChange: state => this.emit(SYNC_EVENT.SESSION_STATE_CHANGED, { state }),
      ...(config.tokenLifetimeMs === undefined ? {} : { tokenLifetimeMs: config.tokenLifetimeMs }),
      ...(config.clock ? { clock: config.clock } : {}),
    });
  }

  /**
   * Log in for timer-driven runs and schedule them.
   * Resolves false when the credential prompt is cancelled or login throws.
   */
  async start(tables?: string[]): Promise<boolean> {
    if (tables) {
      this.selection = [...tables];
    }

    if (!(await this.acquireToken())) {
      this.logger.info('Automatic sync not started: no session');
      return false;
    }

    this.clearTimer();
    if (this.syncInterval > 0) {
      this.syncTimer = setInterval(() => {
        void this.sync(this.selection, RUN_TRIGGER.TIMER);
      }, this.syncInterval);
    }

    this.logger.info('Automatic sync started', { intervalMs: this.syncInterval, tables: this.selection });
    return true;
  }

  /**
   * Stop timer-driven runs; a run already in progress finishes
   */
  stop(): void {
    if (!this.syncTimer) return;
    this.clearTimer();
    this.logger.info('Automatic sync stopped');
  }

  get isRunning(): boolean {
    return this.syncTimer !== undefined;
  }

  get isSyncInProgress(): boolean {
    return this.isSyncing;
  }

  get sessionState() {
    return this.session.state;
  }

  /**
   * Run one sync of the given tables. Never rejects; the outcome is in the result.
   */
  async sync(tables: readonly string[] = this.selection, trigger = RUN_TRIGGER.MANUAL): Promise<SyncRunResult> {
    const startedAt = new Date();

    if (this.isSyncing) {
      this.logger.info('Sync already in progress, trigger dropped', { trigger });
      this.emit(SYNC_EVENT.RUN_SKIPPED, { trigger });
      return { status: RUN_STATUS.SKIPPED, success: false, trigger, tables: [], startedAt, finishedAt: new Date() };
    }

    this.isSyncing = true;
    try {
      return await this.run(tables, trigger, startedAt);
    } finally {
      this.isSyncing = false;
    }
  }

  /**
   * Make sure a valid token is held, prompting when needed.
   * Never rejects; false means there is no session.
   */
  async ensureSession(): Promise<boolean> {
    return (await this.acquireToken()) !== null;
  }

  /**
   * Forget the token and cached credentials
   */
  logout(): void {
    this.session.invalidate();
  }

  /**
   * Read one entity list from the API for display.
   * Resolves null when login is cancelled or the request fails.
   */
  async fetchRecords(entity: ENTITY): Promise<EntityRecord[] | null> {
    const token = await this.acquireToken();
    if (!token) return null;

    const endpoint = TABLES[ENTITY_TABLE[entity]].endpoint;
    const result = await this.api.fetchRecords(endpoint, token);
    if (!result.success) {
      this.logger.error('Fetch failed', { endpoint, status: result.status, error: { message: result.error ?? 'unknown error' } });
      return null;
    }

    try {
      return parseEntityList(entity, result.records);
    } catch (error) {
      this.logger.error('Could not read fetched records', { endpoint, error: errorFields(error) });
      return null;
    }
  }

  /**
   * Read several entity lists in order
   */
  async fetchAll(
    entities: readonly ENTITY[] = [ENTITY.PRODUCT, ENTITY.CLIENT, ENTITY.SALE, ENTITY.SALE_DETAIL],
  ): Promise<Partial<Record<ENTITY, EntityRecord[] | null>>> {
    const results: Partial<Record<ENTITY, EntityRecord[] | null>> = {};
    for (const entity of entities) {
      results[entity] = await this.fetchRecords(entity);
    }
    return results;
  }

  /**
   * Event emitter methods
   */
  on<K extends keyof SyncEvents>(event: K, listener: (data: SyncEvents[K]) => void): () => void {
    return this.eventEmitter.on(event, listener);
  }

  emit<K extends keyof SyncEvents>(event: K, data: SyncEvents[K]): void {
    this.eventEmitter.emit(event, data);
  }

  off<K extends keyof SyncEvents>(event: K, listener: (data: SyncEvents[K]) => void): void {
    this.eventEmitter.off(event, listener);
  }

  removeAllListeners<K extends keyof SyncEvents>(event?: K): void {
    this.eventEmitter.removeAllListeners(event);
  }

  /**
   * Private methods
   */
  private async run(tables: readonly string[], trigger: RUN_TRIGGER, startedAt: Date): Promise<SyncRunResult> {
    const reports: TableReport[] = [];
    const finish = (status: RUN_STATUS, error?: SyncError): SyncRunResult => {
      const result: SyncRunResult = {
        status,
        success: status === RUN_STATUS.COMPLETED,
        trigger,
        tables: reports,
        startedAt,
        finishedAt: new Date(),
        ...(error ? { error } : {}),
      };

      if (status === RUN_STATUS.COMPLETED) {
        this.logger.info('Sync completed', { trigger, tables: reports.length });
        this.emit(SYNC_EVENT.RUN_COMPLETED, { result });
      } else if (status === RUN_STATUS.FAILED) {
        this.logger.error('Sync failed', { trigger, ...(error ? { error: errorFields(error) } : {}) });
        this.emit(SYNC_EVENT.RUN_FAILED, { result });
      } else {
        this.logger.info('Sync cancelled', { trigger });
      }
      return result;
    };

    if (tables.length === 0) {
      return finish(RUN_STATUS.FAILED, new SyncError('NO_TABLES_SELECTED', 'No tables selected'));
    }

    const { ordered, unknown } = orderTables(tables);
    for (const name of unknown) {
      this.logger.warn('Unknown table dropped from selection', { table: name });
    }

    this.emit(SYNC_EVENT.RUN_STARTED, { trigger, tables: ordered });
    this.logger.info('Sync started', { trigger, tables: ordered });

    try {
      const token = await this.session.ensure();
      if (!token) {
        return finish(RUN_STATUS.CANCELLED);
      }

      for (const table of ordered) {
        const outcome = await this.syncTable(table, token);
        reports.push(outcome.report);
        if (outcome.error) {
          return finish(RUN_STATUS.FAILED, outcome.error);
        }
      }
    } catch (error) {
      return finish(RUN_STATUS.FAILED, this.toSyncError(error));
    }

    return finish(RUN_STATUS.COMPLETED);
  }

  private async syncTable(table: TableName, token: string): Promise<TableOutcome> {
    const { endpoint } = TABLES[table];

    const columns = await this.connector.listColumns(table);
    if (columns.length === 0) {
      return this.skip(table, SKIP_REASON.NO_COLUMNS);
    }

    const batch = await this.connector.readUnsynced(table, columns);
    if (batch.rows.length === 0) {
      return this.skip(table, SKIP_REASON.NO_PENDING_ROWS);
    }

    const records = this.transform(batch);
    if (!records) {
      return this.skip(table, SKIP_REASON.TRANSFORMATION_ERROR);
    }

    this.logger.info('Uploading records', { table, endpoint, rowCount: batch.rows.length, uploadCount: records.length });
    const upload = await this.api.upload(endpoint, records, token);

    if (!upload.success) {
      const error = new SyncFailure(table, endpoint, upload.error ?? 'upload rejected', upload.status);
      this.logger.error('Upload failed', {
        table,
        endpoint,
        rowCount: batch.rows.length,
        status: upload.status,
        error: errorFields(error),
      });
      return { report: { table, status: 'failed', error }, error };
    }

    await this.connector.markSynced(table, batch);

    this.logger.info('Table synced', { table, endpoint, rowCount: batch.rows.length });
    this.emit(SYNC_EVENT.TABLE_SYNCED, { table, rowCount: batch.rows.length, uploadedCount: records.length });
    return { report: { table, status: 'synced', rowCount: batch.rows.length, uploadedCount: records.length } };
  }

  private transform(batch: RecordBatch): WireRecord[] | null {
    try {
      return this.transformer.transform(batch);
    } catch (error) {
      if (!(error instanceof TransformationError)) throw error;
      this.logger.error('Transformation failed', { table: batch.table, rowCount: batch.rows.length, error: errorFields(error) });
      return null;
    }
  }

  private skip(table: TableName, reason: SKIP_REASON): TableOutcome {
    this.logger.info('Table skipped', { table, reason });
    this.emit(SYNC_EVENT.TABLE_SKIPPED, { table, reason });
    return { report: { table, status: 'skipped', reason } };
  }

  // Token for calls outside a run; login errors are logged and read as no session
  private async acquireToken(): Promise<string | null> {
    try {
      return await this.session.ensure();
    } catch (error) {
      this.logger.error('Login failed', { error: errorFields(error) });
      return null;
    }
  }

  private toSyncError(error: unknown): SyncError {
    // Database errors (ConnectionError, QueryError, SchemaConfigurationError) keep their type
    if (error instanceof SyncError) {
      return error;
    }
    return new SyncFailure('run', 'local', errorMessage(error), undefined, { cause: error });
  }

  private clearTimer(): void {
    if (this.syncTimer) {
      clearInterval(this.syncTimer);
      this.syncTimer = undefined;
    }
  }
}
