/**
 * Core types for the sync engine
 */

import type { ENGINE, RUN_STATUS, RUN_TRIGGER, SKIP_REASON } from './enums';
import type { SyncError } from './errors';

// Scalar value read from a local table
export type ColumnValue = string | number | bigint | boolean | Date | null;

// Value bound to a query placeholder
export type SqlParam = ColumnValue;

// One row, keyed by column name
export type Row = Record<string, ColumnValue>;

// Rows of one table produced by a single read
export interface RecordBatch {
  table: string;
  columns: string[];
  rows: Row[];
}

// Row reshaped for the remote API
export type WireValue = string | number | bigint | boolean | null;
export type WireRecord = Record<string, WireValue>;

// Tables that take part in a sync run, in no particular order
export type TableName = 'producto' | 'cliente' | 'venta' | 'detalle_venta';

export interface Credentials {
  username: string;
  password: string;
}

// Where and how to reach the local database
export interface ConnectionParams {
  host: string; // Server host, or path to a database file
  database: string;
  user: string;
  password: string;
  integratedSecurity: boolean;
  connectTimeoutMs?: number;
}

// Column name with its declared type, as reported by the engine
export interface ColumnInfo {
  name: string;
  type: string;
}

// Per-table outcome inside a run
export type TableReport =
  | { table: TableName; status: 'synced'; rowCount: number; uploadedCount: number }
  | { table: TableName; status: 'skipped'; reason: SKIP_REASON }
  | { table: TableName; status: 'failed'; error: SyncError };

export interface SyncRunResult {
  status: RUN_STATUS;
  success: boolean;
  trigger: RUN_TRIGGER;
  tables: TableReport[];
  error?: SyncError;
  startedAt: Date;
  finishedAt: Date;
}

// Summary produced when testing a connection
export interface DatabaseInspection {
  engine: ENGINE;
  tables: string[];
  firstTable: string | null;
  columns: string[];
  rowCount: number;
  preview: string;
}
