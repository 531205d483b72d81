/**
 * Core interfaces for the sync engine adapters
 */

import type {
  RecordBatch,
  WireRecord,
  Credentials,
  SqlParam,
  TableName,
  SyncRunResult,
} from './types';
import type { ENGINE, RUN_TRIGGER, SESSION_STATE, SKIP_REASON, SYNC_EVENT } from './enums';

/**
 * Local database connector - one implementation per storage engine
 * (SQLite, SQL Server, MySQL, PostgreSQL, in-memory)
 */
export interface DbConnector {
  readonly engine: ENGINE;

  // Connection lifecycle
  open(): Promise<void>;
  close(): Promise<void>;

  // Schema
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<string[]>;

  // Reads; an empty column list selects every column
  readTable(table: string, columns: string[]): Promise<RecordBatch>;
  readUnsynced(table: string, columns: string[]): Promise<RecordBatch>;

  // Flags every row of the batch as transmitted
  markSynced(table: string, batch: RecordBatch): Promise<void>;
}

/**
 * Statement runner shared by the server-engine drivers
 */
export interface SqlExecutor {
  query(sql: string, params?: readonly SqlParam[]): Promise<Record<string, unknown>[]>;
  execute(sql: string, params?: readonly SqlParam[]): Promise<number>;
}

/**
 * Open driver connection; created by a connector's `connect` function
 */
export interface SqlSession extends SqlExecutor {
  transaction<R>(work: (tx: SqlExecutor) => Promise<R>): Promise<R>;
  close(): Promise<void>;
}

/**
 * Remote API client
 */
export interface ApiClient {
  // Exchange credentials for a bearer token
  login(credentials: Credentials): Promise<string>;

  // Send one table's records to its endpoint
  upload(path: string, records: WireRecord[], token: string): Promise<UploadResult>;

  // Read an entity list for display
  fetchRecords(path: string, token: string): Promise<FetchResult>;
}

/**
 * Upload operation result
 */
export interface UploadResult {
  success: boolean;
  status?: number;
  error?: string;
}

/**
 * Fetch operation result
 */
export interface FetchResult {
  success: boolean;
  records: unknown[];
  status?: number;
  error?: string;
}

/**
 * Why credentials are being requested
 */
export interface CredentialRequest {
  attempt: number;
  reason: 'missing' | 'rejected';
  error?: string;
}

/**
 * Supplies API credentials, usually by prompting the user.
 * Resolving `null` cancels the pending login.
 */
export interface CredentialProvider {
  requestCredentials(request: CredentialRequest): Promise<Credentials | null>;
}

/**
 * Event types for the sync engine
 */
export interface SyncEvents {
  // Run events
  [SYNC_EVENT.RUN_STARTED]: { trigger: RUN_TRIGGER; tables: string[] };
  [SYNC_EVENT.RUN_COMPLETED]: { result: SyncRunResult };
  [SYNC_EVENT.RUN_FAILED]: { result: SyncRunResult };
  [SYNC_EVENT.RUN_SKIPPED]: { trigger: RUN_TRIGGER };

  // Table events
  [SYNC_EVENT.TABLE_SYNCED]: { table: TableName; rowCount: number; uploadedCount: number };
  [SYNC_EVENT.TABLE_SKIPPED]: { table: TableName; reason: SKIP_REASON };

  // Session events
  [SYNC_EVENT.SESSION_STATE_CHANGED]: { state: SESSION_STATE };
}

/**
 * Event emitter interface
 */
export interface EventEmitter {
  on<K extends keyof SyncEvents>(event: K, listener: (data: SyncEvents[K]) => void): () => void;
  emit<K extends keyof SyncEvents>(event: K, data: SyncEvents[K]): void;
  off<K extends keyof SyncEvents>(event: K, listener: (data: SyncEvents[K]) => void): void;
  removeAllListeners<K extends keyof SyncEvents>(event?: K): void;
}
