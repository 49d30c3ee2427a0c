/**
 * CSV encoding (RFC 4180 quoting, `\n` line ends).
 *
 * @module csv
 */

import { valueToString, type ResultSet, type Value } from '@xsql/core';

/** Quote a field when it holds a delimiter, a quote or a line break */
export function escapeCsvValue(value: Value, delimiter = ','): string {
  if (value === null) {
    return '';
  }

  const str = valueToString(value);
  if (str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Encode a result set as CSV: a header row, then one line per row. Every
 * line, the last included, ends with `\n`.
 */
export function toCsv(result: Pick<ResultSet, 'columns' | 'rows'>, delimiter = ','): string {
  const lines: string[] = [];
  lines.push(result.columns.map((column) => escapeCsvValue(column, delimiter)).join(delimiter));

  for (const row of result.rows) {
    lines.push(result.columns.map((column) => escapeCsvValue(row[column] ?? null, delimiter)).join(delimiter));
  }

  return `${lines.join('\n')}\n`;
}
