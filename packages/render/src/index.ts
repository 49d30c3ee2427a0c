/**
 * @xsql/render - output renderers for XSQL result sets
 *
 * @example
 * ```typescript
 * import { createXsqlEngine } from '@xsql/core';
 * import { renderResult } from '@xsql/render';
 *
 * const result = engine.query("SELECT a.href FROM doc TO CSV('links.csv')");
 * const rendering = await renderResult(result);
 * ```
 *
 * @module @xsql/render
 */

export { tempPathFor, writeAtomically, writeTextAtomically } from './atomic-write.js';
export { escapeCsvValue, toCsv } from './csv.js';
export {
  inferColumnType,
  parquetColumns,
  sanitizeColumnNames,
  writeParquetFile,
  type ParquetColumn,
  type ParquetColumnType,
} from './parquet.js';
export { formatList, renderResult, type RenderOptions, type Rendering } from './render.js';
export { displayValue, formatTable, type TableOptions } from './table.js';
