/**
 * Result values and result sets.
 *
 * @module engine/values
 */

import type { OutputClause } from '../lang/ast.js';

/** A cell value */
export type Value = string | number | boolean | null | Value[];

/** One result row: column name to value, keys in column order */
export type ResultRow = Readonly<Record<string, Value>>;

export interface ResultSet {
  readonly columns: readonly string[];
  readonly rows: readonly ResultRow[];
  /** Output directive bound by the statement's TO clause (LIST when absent) */
  readonly output: OutputClause;
}

export const LIST_OUTPUT: OutputClause = Object.freeze({ kind: 'list' });

/** Build a row whose keys follow `columns` */
export function makeRow(columns: readonly string[], values: readonly Value[]): ResultRow {
  return Object.fromEntries(columns.map((column, index) => [column, values[index] ?? null]));
}

/**
 * Order two non-null values: numbers numerically, booleans false first,
 * everything else by UTF-16 code unit of its string form.
 */
export function compareValues(a: Exclude<Value, null>, b: Exclude<Value, null>): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  const left = valueToString(a);
  const right = valueToString(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/** Plain-text form of a value; lists are JSON */
export function valueToString(value: Value): string {
  if (value === null) return '';
  if (Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}
