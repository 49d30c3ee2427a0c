/**
 * Dispatch a result set to the renderer its output directive names.
 *
 * @module render
 */

import * as path from 'node:path';
import { createLogger, type ResultSet, type XsqlLogger } from '@xsql/core';
import { writeAtomically, writeTextAtomically } from './atomic-write.js';
import { toCsv } from './csv.js';
import { writeParquetFile } from './parquet.js';
import { formatTable } from './table.js';

export interface RenderOptions {
  /** Base directory for relative output paths (default: `process.cwd()`) */
  readonly cwd?: string;
  readonly logger?: XsqlLogger;
}

export type Rendering =
  | { readonly kind: 'list'; readonly result: ResultSet }
  | { readonly kind: 'table'; readonly text: string; readonly exportPath: string | null }
  | { readonly kind: 'file'; readonly format: 'csv' | 'parquet'; readonly path: string; readonly rows: number };

/** JSON array of row objects, as the list mode prints it */
export function formatList(result: Pick<ResultSet, 'rows'>): string {
  return JSON.stringify(result.rows, null, 2);
}

/**
 * Render `result` according to its bound output directive. File outputs are
 * written atomically.
 *
 * @throws {OutputError} when a file cannot be written
 */
export async function renderResult(result: ResultSet, options: RenderOptions = {}): Promise<Rendering> {
  const cwd = options.cwd ?? process.cwd();
  const logger = (options.logger ?? createLogger()).child('render');
  const resolve = (target: string): string => path.resolve(cwd, target);
  const { output } = result;

  switch (output.kind) {
    case 'list':
      return { kind: 'list', result };

    case 'table': {
      const text = formatTable(result, { header: output.header });
      if (output.exportPath === null) {
        return { kind: 'table', text, exportPath: null };
      }
      const exportPath = resolve(output.exportPath);
      await writeTextAtomically(exportPath, toCsv(result));
      logger.info('Table exported', { path: exportPath, rows: result.rows.length });
      return { kind: 'table', text, exportPath };
    }

    case 'csv': {
      const target = resolve(output.path);
      await writeTextAtomically(target, toCsv(result));
      logger.info('CSV written', { path: target, rows: result.rows.length });
      return { kind: 'file', format: 'csv', path: target, rows: result.rows.length };
    }

    case 'parquet': {
      const target = resolve(output.path);
      await writeAtomically(target, (tempPath) => writeParquetFile(tempPath, result));
      logger.info('Parquet written', { path: target, rows: result.rows.length });
      return { kind: 'file', format: 'parquet', path: target, rows: result.rows.length };
    }
  }
}
