/**
 * Connection test report: what a connector can see, with a few sample rows
 */

import type { DbConnector } from './interfaces';
import type { ColumnValue, DatabaseInspection, RecordBatch } from './types';

function formatValue(value: ColumnValue | undefined): string {
  if (value === undefined || value === null) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Render the first rows of a batch as `Row n: a | b` lines
 */
export function formatBatchPreview(batch: RecordBatch, maxRows: number = 5): string {
  if (batch.rows.length === 0) return '(no rows)';

  const lines = batch.rows
    .slice(0, maxRows)
    .map((row, index) => `Row ${index + 1}: ${batch.columns.map(column => formatValue(row[column])).join(' | ')}`);

  const remaining = batch.rows.length - maxRows;
  if (remaining > 0) {
    lines.push(`... (${remaining} more rows)`);
  }
  return lines.join('\n');
}

export async function inspectDatabase(
  connector: DbConnector,
  options: { sampleRows?: number } = {},
): Promise<DatabaseInspection> {
  await connector.open();

  const tables = await connector.listTables();
  const [firstTable] = tables;
  if (firstTable === undefined) {
    return { engine: connector.engine, tables, firstTable: null, columns: [], rowCount: 0, preview: '(no tables)' };
  }

  const columns = await connector.listColumns(firstTable);
  const batch = await connector.readTable(firstTable, columns);

  return {
    engine: connector.engine,
    tables,
    firstTable,
    columns,
    rowCount: batch.rows.length,
    preview: formatBatchPreview(batch, options.sampleRows ?? 5),
  };
}
