/**
 * In-memory connector for testing and simple use cases
 */

import type { DbConnector } from '../interfaces';
import type { ColumnValue, RecordBatch, Row } from '../types';
import { ENGINE } from '../enums';
import { ConnectionError, QueryError } from '../errors';
import { findColumn, getRowValue, identityValues, resolveSyncColumns } from '../utils';

export interface MemoryTable {
  columns: string[];
  rows: Row[];
}

export interface MemoryConnectorOptions {
  engine?: ENGINE; // Engine this connector stands in for
  openError?: string; // Reject open() with this detail
  failingTables?: string[]; // Reject markSynced() for these tables
}

/**
 * Simple in-memory implementation of DbConnector.
 * Mirrors the SQL connectors: NULL or 0 flags count as unsynced and
 * marking a batch is all-or-nothing.
 */
export class MemoryConnector implements DbConnector {
  readonly engine: ENGINE;
  private tables = new Map<string, MemoryTable>();
  private isOpen = false;
  private openCount = 0;
  private readonly openError: string | undefined;
  private readonly failingTables: Set<string>;

  constructor(tables: Record<string, MemoryTable> = {}, options: MemoryConnectorOptions = {}) {
    this.engine = options.engine ?? ENGINE.SQLITE;
    this.openError = options.openError;
    this.failingTables = new Set(options.failingTables ?? []);
    for (const [name, table] of Object.entries(tables)) {
      this.setTable(name, table);
    }
  }

  async open(): Promise<void> {
    if (this.isOpen) return;
    if (this.openError !== undefined) {
      throw new ConnectionError(this.engine, this.openError);
    }
    this.isOpen = true;
    this.openCount++;
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  async listTables(): Promise<string[]> {
    await this.open();
    return Array.from(this.tables.keys()).sort();
  }

  async listColumns(table: string): Promise<string[]> {
    await this.open();
    return [...(this.tables.get(table)?.columns ?? [])];
  }

  async readTable(table: string, columns: string[]): Promise<RecordBatch> {
    const source = await this.requireTable(table);
    return this.project(table, source, columns, source.rows);
  }

  async readUnsynced(table: string, columns: string[]): Promise<RecordBatch> {
    const source = await this.requireTable(table);
    const sync = resolveSyncColumns(table, source.columns);

    const rows = sync ? source.rows.filter(row => !isSyncedValue(row[sync.flag] ?? null)) : source.rows;
    return this.project(table, source, columns, rows);
  }

  async markSynced(table: string, batch: RecordBatch): Promise<void> {
    if (batch.rows.length === 0) return;

    const source = await this.requireTable(table);
    const sync = resolveSyncColumns(table, source.columns);
    if (!sync) return;

    const ids = identityValues(table, batch.rows, sync.identity);
    if (this.failingTables.has(table)) {
      throw new QueryError(this.engine, table, 'update rejected');
    }

    const wanted = new Set(ids.map(keyOf));
    source.rows = source.rows.map(row =>
      wanted.has(keyOf(row[sync.identity] ?? null)) ? { ...row, [sync.flag]: 1 } : row,
    );
  }

  // Utility methods for testing and debugging
  setTable(name: string, table: MemoryTable): void {
    this.tables.set(name, { columns: [...table.columns], rows: table.rows.map(row => ({ ...row })) });
  }

  getRows(table: string): Row[] {
    return (this.tables.get(table)?.rows ?? []).map(row => ({ ...row }));
  }

  isConnected(): boolean {
    return this.isOpen;
  }

  getOpenCount(): number {
    return this.openCount;
  }

  private async requireTable(table: string): Promise<MemoryTable> {
    await this.open();
    const source = this.tables.get(table);
    if (!source) {
      throw new QueryError(this.engine, table, 'no such table');
    }
    return source;
  }

  private project(table: string, source: MemoryTable, columns: string[], rows: Row[]): RecordBatch {
    if (columns.length === 0) {
      return { table, columns: [...source.columns], rows: rows.map(row => ({ ...row })) };
    }

    for (const column of columns) {
      if (!findColumn(source.columns, column)) {
        throw new QueryError(this.engine, table, `no such column: ${column}`);
      }
    }

    return {
      table,
      columns: [...columns],
      rows: rows.map(row => {
        const projected: Row = {};
        for (const column of columns) {
          projected[column] = getRowValue(row, column) ?? null;
        }
        return projected;
      }),
    };
  }
}

function isSyncedValue(value: ColumnValue): boolean {
  return value !== null && value !== false && value !== 0 && value !== '0';
}

function keyOf(value: ColumnValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}
