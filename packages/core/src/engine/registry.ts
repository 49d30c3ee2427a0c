/**
 * SHOW and DESCRIBE: static language tables plus the bound inputs.
 *
 * @module engine/registry
 */

import type { DocumentTree } from '@xsql/dom';
import type { DescribeQuery, ShowQuery } from '../lang/ast.js';
import metaTables from './data/meta-tables.json' with { type: 'json' };
import { LIST_OUTPUT, makeRow, type ResultSet, type Value } from './values.js';

export interface BoundInputs {
  readonly document: DocumentTree | null;
  readonly aliases: ReadonlyMap<string, DocumentTree>;
}

interface MetaTable {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly Value[])[];
}

function toResultSet(table: MetaTable): ResultSet {
  return {
    columns: [...table.columns],
    rows: table.rows.map((values) => makeRow(table.columns, values)),
    output: LIST_OUTPUT,
  };
}

export function executeMeta(statement: ShowQuery | DescribeQuery, inputs: BoundInputs): ResultSet {
  if (statement.kind === 'describe') {
    return toResultSet(statement.target === 'document' ? metaTables.document : metaTables.language);
  }

  switch (statement.target) {
    case 'input':
      return toResultSet({
        columns: ['key', 'value'],
        rows: [['source_uri', inputs.document?.sourceUri ?? null]],
      });
    case 'inputs': {
      const rows: Value[][] = [];
      if (inputs.document) rows.push(['document', inputs.document.sourceUri]);
      for (const [alias, tree] of inputs.aliases) {
        rows.push([alias, tree.sourceUri]);
      }
      return toResultSet({ columns: ['alias', 'source_uri'], rows });
    }
    case 'functions':
      return toResultSet(metaTables.functions);
    case 'axes':
      return toResultSet(metaTables.axes);
    case 'operators':
      return toResultSet(metaTables.operators);
  }
}
