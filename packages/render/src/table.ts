/**
 * Aligned text grid for `TO TABLE(...)` and the REPL's table mode.
 *
 * @module table
 */

import { valueToString, type ResultSet, type Value } from '@xsql/core';

export interface TableOptions {
  /** Print the column names and a dash rule above the rows (default: true) */
  readonly header?: boolean;
}

/** Display form of a cell; line breaks become spaces */
export function displayValue(value: Value): string {
  if (value === null) return 'NULL';
  return valueToString(value).replace(/\r?\n/g, ' ');
}

/**
 * Render rows as `|`-separated, space-padded columns.
 *
 * @example
 * ```typescript
 * formatTable({ columns: ['tag', 'node_id'], rows: [{ tag: 'a', node_id: 5 }] });
 * // tag | node_id
 * // ----+--------
 * // a   | 5
 * ```
 */
export function formatTable(result: Pick<ResultSet, 'columns' | 'rows'>, options: TableOptions = {}): string {
  const header = options.header ?? true;
  const { columns } = result;
  if (columns.length === 0) return '';

  const cells = result.rows.map((row) => columns.map((column) => displayValue(row[column] ?? null)));
  const widths = columns.map((column, index) =>
    Math.max(header ? column.length : 0, ...cells.map((row) => (row[index] ?? '').length))
  );

  const line = (values: readonly string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(' | ')
      .trimEnd();

  const lines: string[] = [];
  if (header) {
    lines.push(line(columns));
    lines.push(widths.map((width) => '-'.repeat(width)).join('-+-'));
  }
  for (const row of cells) {
    lines.push(line(row));
  }
  return lines.join('\n');
}
