/**
 * Parquet output through @dsnp/parquetjs.
 *
 * Every result column becomes one optional Parquet column, in result order.
 *
 * @module parquet
 */

import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { valueToString, type ResultSet, type Value } from '@xsql/core';

export type ParquetColumnType = 'INT64' | 'DOUBLE' | 'BOOLEAN' | 'UTF8';

export interface ParquetColumn {
  /** Result column name */
  readonly source: string;
  /** Sanitised Parquet field name */
  readonly name: string;
  readonly type: ParquetColumnType;
}

/** Replace anything outside `[A-Za-z0-9_]` and keep names unique */
export function sanitizeColumnNames(columns: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return columns.map((column, index) => {
    const cleaned = column.replace(/[^A-Za-z0-9_]/g, '_');
    const base = cleaned === '' ? `col${index + 1}` : cleaned;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

/** Narrowest type holding every non-null value; all-null columns are UTF8 */
export function inferColumnType(values: readonly Value[]): ParquetColumnType {
  const present = values.filter((value) => value !== null);
  if (present.length === 0) return 'UTF8';
  if (present.every((value) => typeof value === 'number' && Number.isInteger(value))) return 'INT64';
  if (present.every((value) => typeof value === 'number')) return 'DOUBLE';
  if (present.every((value) => typeof value === 'boolean')) return 'BOOLEAN';
  return 'UTF8';
}

export function parquetColumns(result: Pick<ResultSet, 'columns' | 'rows'>): ParquetColumn[] {
  const names = sanitizeColumnNames(result.columns);
  return result.columns.map((source, index) => ({
    source,
    name: names[index] ?? source,
    type: inferColumnType(result.rows.map((row) => row[source] ?? null)),
  }));
}

function toParquetValue(value: Exclude<Value, null>, type: ParquetColumnType): string | number | boolean {
  switch (type) {
    case 'INT64':
    case 'DOUBLE':
      return typeof value === 'number' ? value : valueToString(value);
    case 'BOOLEAN':
      return typeof value === 'boolean' ? value : valueToString(value);
    case 'UTF8':
      return valueToString(value);
  }
}

/** Write `result` to `path` as a single Parquet file */
export async function writeParquetFile(path: string, result: Pick<ResultSet, 'columns' | 'rows'>): Promise<void> {
  const columns = parquetColumns(result);
  const schema = new ParquetSchema(
    Object.fromEntries(columns.map((column) => [column.name, { type: column.type, optional: true }]))
  );

  const writer = await ParquetWriter.openFile(schema, path);
  try {
    for (const row of result.rows) {
      const record: Record<string, string | number | boolean> = {};
      for (const column of columns) {
        const value = row[column.source] ?? null;
        // absent field = Parquet null
        if (value !== null) {
          record[column.name] = toParquetValue(value, column.type);
        }
      }
      await writer.appendRow(record);
    }
  } finally {
    await writer.close();
  }
}
