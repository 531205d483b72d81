/**
 * Reshapes local rows into the records the remote API accepts
 */

import type { ColumnValue, RecordBatch, Row, WireRecord, WireValue } from './types';
import { TABLES, isTableName } from './tables';
import { TransformationError, errorMessage } from './errors';
import { findColumn } from './utils';

// Null for dates that cannot be rendered (zero datetimes come back as Invalid Date)
function isoDate(value: Date): string | null {
  return Number.isNaN(value.getTime()) ? null : value.toISOString();
}

function toWireValue(table: string, column: string, value: ColumnValue | undefined): WireValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value.trim();
  if (value instanceof Date) {
    const iso = isoDate(value);
    if (iso === null) {
      throw new TransformationError(table, `${column}: invalid date`);
    }
    return iso;
  }
  return value;
}

/**
 * Key under which two rows count as duplicates: every value rendered as text,
 * trimmed and lower-cased, each followed by `|`
 */
export function dedupeKey(row: Row, columns: readonly string[]): string {
  let key = '';
  for (const column of columns) {
    const value = row[column];
    const text =
      value === undefined || value === null
        ? ''
        : value instanceof Date
          ? (isoDate(value) ?? 'invalid date')
          : String(value);
    key += text.trim().toLowerCase() + '|';
  }
  return key;
}

export class RowTransformer {
  constructor(private readonly columnMaps: Record<string, Record<string, string>> = defaultColumnMaps()) {}

  /**
   * Rename columns to wire fields, normalize values and drop duplicate rows.
   */
  transform(batch: RecordBatch): WireRecord[] {
    const columnMap = this.columnMaps[batch.table.trim().toLowerCase()] ?? {};
    const mapKeys = Object.keys(columnMap);
    const fields = batch.columns.map(column => {
      const key = findColumn(mapKeys, column);
      return key === undefined ? column : (columnMap[key] ?? column);
    });

    const seen = new Set<string>();
    const records: WireRecord[] = [];

    for (const row of batch.rows) {
      const key = dedupeKey(row, batch.columns);
      if (seen.has(key)) continue;
      seen.add(key);

      const record: WireRecord = {};
      batch.columns.forEach((column, index) => {
        record[fields[index] ?? column] = toWireValue(batch.table, column, row[column]);
      });
      records.push(record);
    }

    try {
      JSON.stringify(records);
    } catch (error) {
      throw new TransformationError(batch.table, errorMessage(error), { cause: error });
    }

    return records;
  }
}

function defaultColumnMaps(): Record<string, Record<string, string>> {
  const maps: Record<string, Record<string, string>> = {};
  for (const [table, definition] of Object.entries(TABLES)) {
    if (isTableName(table)) maps[table] = definition.columnMap;
  }
  return maps;
}
