/**
 * @xsql/cli - Session
 *
 * Shared state of one CLI run: the engine with its loaded document, the
 * display mode and where output goes. One-shot queries and the REPL both
 * drive a session.
 *
 * @module @xsql/cli/session
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  LexError,
  ParseError,
  SourceError,
  XsqlError,
  createLogger,
  createXsqlEngine,
  ensureXsqlError,
  formatCaret,
  type ResultSet,
  type XsqlEngine,
  type XsqlLogger,
} from '@xsql/core';
import { parseHtml, type DocumentTree } from '@xsql/dom';
import { formatList, formatTable, renderResult, type Rendering } from '@xsql/render';
import type { CliConfig, DisplayMode } from './config/types.js';

/** Where the session prints */
export interface Output {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: Output = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export interface SessionOptions {
  readonly config: CliConfig;
  readonly cwd?: string;
  readonly output?: Output;
  readonly logger?: XsqlLogger;
}

/**
 * Human-readable error report; lex and parse errors get a caret under the
 * offending offset.
 */
export function formatError(error: unknown, statement: string): string {
  const xsqlError = ensureXsqlError(error);
  const lines = [`Error [${xsqlError.code}] ${xsqlError.message}`];

  if (xsqlError instanceof LexError || xsqlError instanceof ParseError) {
    lines.push(formatCaret(statement, xsqlError.offset));
  }

  const cause = xsqlError.cause;
  const suggestion = cause instanceof XsqlError ? cause.suggestion : xsqlError.suggestion;
  if (suggestion) {
    lines.push(`Suggestion: ${suggestion}`);
  }
  return lines.join('\n');
}

export class XsqlSession {
  readonly engine: XsqlEngine;
  mode: DisplayMode;
  /** Rows printed in table mode; null prints all */
  maxDisplayRows: number | null;

  private readonly cwd: string;
  private readonly output: Output;
  private readonly logger: XsqlLogger;

  constructor(options: SessionOptions) {
    const { config } = options;
    this.cwd = options.cwd ?? process.cwd();
    this.output = options.output ?? consoleOutput;
    this.logger =
      options.logger ??
      createLogger({ module: 'xsql', level: config.engine.logger.level, json: config.engine.logger.json });
    this.mode = config.mode;
    this.maxDisplayRows = config.maxDisplayRows;
    this.engine = createXsqlEngine({
      config: config.engine,
      logger: this.logger,
      readFile: (file) => fs.readFileSync(path.resolve(this.cwd, file), 'utf-8'),
    });
  }

  /**
   * Parse an HTML file. With an alias the tree is bound under that name,
   * otherwise it becomes the input document.
   *
   * @throws {SourceError} XSQL_S301 when the file cannot be read
   */
  load(file: string, alias?: string): DocumentTree {
    const resolved = path.resolve(this.cwd, file);
    let markup: string;
    try {
      markup = fs.readFileSync(resolved, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new SourceError('XSQL_S301', `Cannot read '${file}': ${cause.message}`, { location: file }, cause);
    }

    const tree = parseHtml(markup, { sourceUri: file });
    if (alias === undefined) {
      this.engine.load(tree);
    } else {
      this.engine.bind(alias, tree);
    }
    return tree;
  }

  /** Run one statement and print its result; false when it failed */
  async run(statement: string): Promise<boolean> {
    try {
      const result = this.engine.query(statement);
      const rendering = await renderResult(result, { cwd: this.cwd, logger: this.logger });
      this.display(result, rendering);
      return true;
    } catch (error) {
      this.output.err(formatError(error, statement));
      return false;
    }
  }

  /** Run statements in order, stopping at the first failure */
  async runAll(statements: readonly string[]): Promise<boolean> {
    for (const statement of statements) {
      if (!(await this.run(statement))) return false;
    }
    return true;
  }

  destroy(): void {
    this.engine.destroy();
  }

  private display(result: ResultSet, rendering: Rendering): void {
    switch (rendering.kind) {
      case 'list':
        this.output.out(this.mode === 'table' ? this.tableText(result) : formatList(result));
        break;
      case 'table':
        this.output.out(rendering.text);
        if (rendering.exportPath !== null) {
          this.output.out(`Exported ${result.rows.length} rows to ${rendering.exportPath}`);
        }
        break;
      case 'file':
        this.output.out(`Wrote ${rendering.rows} rows to ${rendering.path}`);
        break;
    }
  }

  private tableText(result: ResultSet): string {
    const limit = this.maxDisplayRows;
    if (limit === null || result.rows.length <= limit) {
      return formatTable(result);
    }
    const shown = formatTable({ columns: result.columns, rows: result.rows.slice(0, limit) });
    return `${shown}\n(showing ${limit} of ${result.rows.length} rows)`;
  }
}
