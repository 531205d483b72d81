/**
 * Utility functions for the sync engine
 */

import type { ColumnValue, Row } from './types';
import { IDENTITY_COLUMN, SYNC_FLAG_COLUMN } from './tables';
import { SchemaConfigurationError } from './errors';

/**
 * Generate a new timestamp
 */
export function now(): number {
  return Date.now();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find a column by name, ignoring case. Returns the name as the engine spells it.
 */
export function findColumn(columns: readonly string[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return columns.find(column => column.toLowerCase() === wanted);
}

/**
 * Read a row value by column name, ignoring case
 */
export function getRowValue(row: Row, column: string): ColumnValue | undefined {
  if (column in row) return row[column];
  const key = findColumn(Object.keys(row), column);
  return key === undefined ? undefined : row[key];
}

export interface SyncColumns {
  flag: string;
  identity: string;
}

/**
 * Locate the synced-flag and identity columns of a table.
 * Returns null when the table does not track synced state.
 */
export function resolveSyncColumns(table: string, columns: readonly string[]): SyncColumns | null {
  const flag = findColumn(columns, SYNC_FLAG_COLUMN);
  if (!flag) return null;

  const identity = findColumn(columns, IDENTITY_COLUMN);
  if (!identity) {
    throw new SchemaConfigurationError(
      table,
      `has a ${SYNC_FLAG_COLUMN} column but no ${IDENTITY_COLUMN} column to key updates on`,
    );
  }

  return { flag, identity };
}

/**
 * Identity values of every row in a batch
 */
export function identityValues(table: string, rows: readonly Row[], identity: string): ColumnValue[] {
  return rows.map(row => {
    const value = getRowValue(row, identity);
    if (value === undefined || value === null) {
      throw new SchemaConfigurationError(table, `row without a value for ${identity} cannot be marked`);
    }
    return value;
  });
}

/**
 * Coerce a driver value into a ColumnValue
 */
export function toColumnValue(value: unknown): ColumnValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
    default:
      break;
  }

  if (value instanceof Date) return value;
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');

  return JSON.stringify(value);
}

/**
 * Turn driver rows into typed rows
 */
export function toRows(records: readonly Record<string, unknown>[]): Row[] {
  return records.map(record => {
    const row: Row = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = toColumnValue(value);
    }
    return row;
  });
}

/**
 * Column names of a result set, from the first row when the engine does not
 * report them separately
 */
export function columnsOf(requested: readonly string[], rows: readonly Row[]): string[] {
  if (requested.length > 0) return [...requested];
  const first = rows[0];
  return first ? Object.keys(first) : [];
}

/**
 * Quote an identifier by wrapping it and doubling the closing character
 */
export function quoteIdentifier(name: string, open: string, close: string = open): string {
  return `${open}${name.split(close).join(close + close)}${close}`;
}

/**
 * Split `host:port`; bracketed IPv6 hosts keep their brackets stripped
 */
export function splitHostPort(host: string): { host: string; port?: number } {
  const trimmed = host.trim();

  const ipv6 = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (ipv6) {
    const [, address = trimmed, port] = ipv6;
    return port ? { host: address, port: Number(port) } : { host: address };
  }

  const match = /^([^:]+):(\d+)$/.exec(trimmed);
  if (match) {
    const [, name = trimmed, port] = match;
    return { host: name, port: Number(port) };
  }

  return { host: trimmed };
}
