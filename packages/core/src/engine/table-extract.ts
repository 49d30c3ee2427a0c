/**
 * HTML table extraction for `SELECT table ... TO TABLE(...)`.
 *
 * @module engine/table-extract
 */

import { childrenOf, descendantsOf, nodeAt, textContent, type DocumentNode, type DocumentTree } from '@xsql/dom';
import { XsqlError } from '../errors/index.js';
import type { SelectQuery } from '../lang/ast.js';
import { makeRow, type ResultRow } from './values.js';

export interface ExtractedTable {
  readonly columns: string[];
  readonly rows: ResultRow[];
}

/** A lone `table` tag selected into TO TABLE */
export function isTableExtraction(query: SelectQuery): boolean {
  const [item] = query.items;
  return query.output?.kind === 'table' && query.items.length === 1 && item?.kind === 'node' && item.tag === 'table';
}

function cellText(tree: DocumentTree, cell: DocumentNode): string {
  return textContent(tree, cell.id).replace(/\s+/g, ' ').trim();
}

/** Rows of `table`, skipping rows that belong to a nested table */
function tableRows(tree: DocumentTree, table: DocumentNode): DocumentNode[] {
  return descendantsOf(tree, table).filter((node) => {
    if (node.tag !== 'tr') return false;
    let parent = node.parent;
    while (parent !== null) {
      const ancestor = nodeAt(tree, parent);
      if (ancestor.tag === 'table') return ancestor.id === table.id;
      parent = ancestor.parent;
    }
    return false;
  });
}

function uniqueNames(names: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return names.map((name, index) => {
    const base = name === '' ? `col${index + 1}` : name;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

/**
 * Turn the single matched table into rows of its `td`/`th` cells. With
 * `header`, the first row names the columns; otherwise they are col1..colN.
 * Short rows are padded with null.
 *
 * @throws {XsqlError} XSQL_E503 when more than one table matched
 */
export function extractTable(tree: DocumentTree, tables: readonly DocumentNode[], header: boolean): ExtractedTable {
  if (tables.length > 1) {
    throw new XsqlError({
      code: 'XSQL_E503',
      message: `Table extraction matched ${tables.length} tables; expected one`,
      context: { tables: tables.map((table) => table.id) },
    });
  }
  const [table] = tables;
  if (!table) return { columns: [], rows: [] };

  const cells = tableRows(tree, table).map((row) =>
    childrenOf(tree, row)
      .filter((cell) => cell.tag === 'td' || cell.tag === 'th')
      .map((cell) => cellText(tree, cell))
  );

  const body = header ? cells.slice(1) : cells;
  const headerCells = header ? (cells[0] ?? []) : [];
  const width = Math.max(headerCells.length, ...body.map((row) => row.length), 0);
  const columns = uniqueNames(
    Array.from({ length: width }, (_, index) => (header ? (headerCells[index] ?? '') : ''))
  );

  return { columns, rows: body.map((row) => makeRow(columns, row)) };
}
