/**
 * ORDER BY: stable multi-key sort.
 *
 * @module engine/order
 */

import type { DocumentNode } from '@xsql/dom';
import { XsqlError } from '../errors/index.js';
import { isIntrinsicField, type OrderItem } from '../lang/ast.js';
import { intrinsicValue } from './fields.js';
import { compareValues, type ResultRow, type Value } from './values.js';

/** A projected row together with the candidate node it was built from */
export interface WorkingRow {
  readonly anchor: DocumentNode | null;
  readonly row: ResultRow;
}

type KeyReader = (row: WorkingRow) => Value;

function keyReader(item: OrderItem, columns: readonly string[]): KeyReader {
  const { key } = item;
  const field = key.toLowerCase();
  const column = columns.includes(key) ? key : columns.find((name) => name.toLowerCase() === field);
  if (column !== undefined) {
    return ({ row }) => row[column] ?? null;
  }

  if (isIntrinsicField(field)) {
    return ({ anchor }) => (anchor ? intrinsicValue(anchor, field) : null);
  }

  throw new XsqlError({
    code: 'XSQL_E502',
    message: `Unknown ORDER BY key '${key}'`,
    context: { key, position: item.position, columns: [...columns] },
  });
}

/**
 * Sort rows by the ORDER BY keys. Ties keep their input order; nulls sort
 * last in both directions.
 *
 * @throws {XsqlError} XSQL_E502 for a key that is neither a column nor a node field
 */
export function sortRows(rows: readonly WorkingRow[], orderBy: readonly OrderItem[], columns: readonly string[]): WorkingRow[] {
  if (orderBy.length === 0) return [...rows];

  const keys = orderBy.map((item) => ({ read: keyReader(item, columns), sign: item.direction === 'desc' ? -1 : 1 }));

  const decorated = rows.map((row, index) => ({ row, index, values: keys.map((key) => key.read(row)) }));
  decorated.sort((a, b) => {
    for (let i = 0; i < keys.length; i++) {
      const left = a.values[i] ?? null;
      const right = b.values[i] ?? null;
      if (left === null && right === null) continue;
      if (left === null) return 1;
      if (right === null) return -1;
      const cmp = compareValues(left, right);
      if (cmp !== 0) return cmp * (keys[i]?.sign ?? 1);
    }
    return a.index - b.index;
  });
  return decorated.map((entry) => entry.row);
}
