/**
 * Statement executor.
 *
 * A SELECT runs as a fixed pipeline of stages:
 *
 * ```
 * resolve_source → filter → project → aggregate → order_by → limit → bind
 * ```
 *
 * `aggregate` runs only when the select list has COUNT or TFIDF. Stages are
 * synchronous; a host AbortSignal is checked between them. Any error raised
 * inside a stage surfaces as an {@link ExecutionError} naming that stage and
 * no partial result is returned.
 *
 * @module engine/executor
 */

import type { DocumentNode, DocumentTree } from '@xsql/dom';
import { textContent } from '@xsql/dom';
import { readFileSync } from 'node:fs';
import { resolveEngineConfig, type EngineConfig } from '../config.js';
import { ExecutionError, XsqlError } from '../errors/index.js';
import { isAggregateItem, type SelectItem, type SelectQuery, type Statement } from '../lang/ast.js';
import { createLogger, type XsqlLogger } from '../observability/index.js';
import { compileFilter, compileFlattenFilter, type NodePredicate } from './filter.js';
import { sortRows, type WorkingRow } from './order.js';
import { projectNode, resultColumns, selectCandidates } from './projection.js';
import { executeMeta } from './registry.js';
import { resolveSource, type ReadFile, type SubqueryResult } from './source.js';
import { extractTable, isTableExtraction } from './table-extract.js';
import { scoreTfidf } from './text-analysis.js';
import { LIST_OUTPUT, makeRow, type ResultSet, type Value } from './values.js';

export type Stage = 'resolve_source' | 'filter' | 'project' | 'aggregate' | 'order_by' | 'limit' | 'bind';

export type ExecutionEvent =
  | { readonly type: 'stage-start'; readonly stage: Stage; readonly timestamp: number }
  | {
      readonly type: 'stage-end';
      readonly stage: Stage;
      readonly timestamp: number;
      readonly rows: number;
      readonly durationMs: number;
    };

export interface ExecuteOptions {
  /** Checked between stages */
  readonly signal?: AbortSignal;
  /** Named trees a bare alias in FROM can refer to */
  readonly aliases?: ReadonlyMap<string, DocumentTree>;
  /** Reads file sources; defaults to a UTF-8 `readFileSync` */
  readonly readFile?: ReadFile;
  readonly config?: EngineConfig;
  readonly logger?: XsqlLogger;
  readonly onEvent?: (event: ExecutionEvent) => void;
}

interface PipelineState {
  tree: DocumentTree | null;
  alias: string | null;
  columns: string[];
  candidates: DocumentNode[];
  /** Descendant part of the WHERE clause of a FLATTEN_TEXT query */
  flattenFilter: NodePredicate | null;
  rows: WorkingRow[];
}

const defaultReadFile: ReadFile = (path) => readFileSync(path, 'utf8');

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class Executor {
  private readonly config: EngineConfig;
  private readonly logger: XsqlLogger;
  private readonly aliases: ReadonlyMap<string, DocumentTree>;
  private readonly readFile: ReadFile;

  constructor(
    private readonly document: DocumentTree | null,
    private readonly options: ExecuteOptions = {}
  ) {
    this.config = options.config ?? resolveEngineConfig();
    this.logger = (options.logger ?? createLogger()).child('executor');
    this.aliases = options.aliases ?? new Map();
    this.readFile = options.readFile ?? defaultReadFile;
  }

  execute(statement: Statement): ResultSet {
    if (statement.kind !== 'select') {
      this.logger.debug('Meta statement', { kind: statement.kind, target: statement.target });
      return executeMeta(statement, { document: this.document, aliases: this.aliases });
    }

    const state = this.runPipeline(statement);
    return this.runStage('bind', () => ({
      columns: state.columns,
      rows: state.rows.map(({ row }) => row),
      output: statement.output ?? LIST_OUTPUT,
    }), (result) => result.rows.length);
  }

  /** Everything up to (not including) bind; also serves FRAGMENTS subqueries */
  private runPipeline(query: SelectQuery): PipelineState {
    const state: PipelineState = {
      tree: null,
      alias: null,
      columns: resultColumns(query.items, query.exclude),
      candidates: [],
      flattenFilter: null,
      rows: [],
    };

    this.runStage('resolve_source', () => {
      const resolved = resolveSource(query.source, {
        document: this.document,
        aliases: this.aliases,
        readFile: this.readFile,
        runSubquery: (subquery) => this.runSubquery(subquery),
      });
      state.tree = resolved.tree;
      state.alias = resolved.alias;
      return resolved;
    }, (resolved) => resolved.tree?.nodes.length ?? 0);

    this.runStage('filter', () => {
      const predicate = this.compileWhere(query, state);
      const { tree } = state;
      if (!tree) return state.candidates;
      const candidates = selectCandidates(tree, query.items);
      state.candidates = predicate ? candidates.filter((node) => predicate(tree, node)) : candidates;
      return state.candidates;
    }, (candidates) => candidates.length);

    this.runStage('project', () => {
      state.rows = this.project(query, state);
      return state.rows;
    }, (rows) => rows.length);

    if (query.items.some(isAggregateItem)) {
      this.runStage('aggregate', () => {
        state.rows = this.aggregate(query.items, state);
        return state.rows;
      }, (rows) => rows.length);
    }

    this.runStage('order_by', () => {
      state.rows = sortRows(state.rows, query.orderBy, state.columns);
      return state.rows;
    }, (rows) => rows.length);

    this.runStage('limit', () => {
      let rows = query.limit === null ? state.rows : state.rows.slice(0, query.limit);
      if (this.config.maxRows !== null && rows.length > this.config.maxRows) {
        this.logger.warn('Result truncated by maxRows', { maxRows: this.config.maxRows, rows: rows.length });
        rows = rows.slice(0, this.config.maxRows);
      }
      state.rows = rows;
      return rows;
    }, (rows) => rows.length);

    return state;
  }

  private compileWhere(query: SelectQuery, state: PipelineState): NodePredicate | null {
    const { where } = query;
    if (!where) return null;
    const context = { alias: state.alias };
    if (!query.items.some((item) => item.kind === 'flatten_text')) {
      return compileFilter(where, context);
    }
    const split = compileFlattenFilter(where, context);
    state.flattenFilter = split.descendant;
    return split.base;
  }

  private runSubquery(query: SelectQuery): SubqueryResult {
    const { columns, rows, tree } = this.runPipeline(query);
    return { columns, rows, tree };
  }

  private project(query: SelectQuery, state: PipelineState): WorkingRow[] {
    const { tree } = state;
    if (!tree) return [];

    if (isTableExtraction(query)) {
      const header = query.output?.kind === 'table' ? query.output.header : true;
      const table = extractTable(tree, state.candidates, header);
      state.columns = table.columns;
      return table.rows.map((row) => ({ anchor: null, row }));
    }

    const options = { summaryLength: this.config.summaryLength, flattenFilter: state.flattenFilter };
    return state.candidates.map((node) => ({
      anchor: node,
      row: makeRow(state.columns, projectNode(tree, node, query.items, query.exclude, options)),
    }));
  }

  private aggregate(items: readonly SelectItem[], state: PipelineState): WorkingRow[] {
    const { tree, candidates, columns } = state;
    if (!tree) return state.rows;

    const countOf = (tag: string | null): number =>
      tag === null ? candidates.length : candidates.filter((node) => node.tag === tag).length;

    if (items.every((item) => item.kind === 'count')) {
      const values = items.map((item) => (item.kind === 'count' ? countOf(item.tag) : null));
      return [{ anchor: null, row: makeRow(columns, values) }];
    }

    const overrides = new Map<string, Value[]>();
    for (const item of items) {
      if (item.kind === 'count') {
        overrides.set(item.name, state.rows.map(() => countOf(item.tag)));
      } else if (item.kind === 'tfidf') {
        overrides.set(item.name, this.tfidfColumn(item, tree, state.rows));
      }
    }

    return state.rows.map(({ anchor, row }, index) => ({
      anchor,
      row: makeRow(
        columns,
        columns.map((column) => {
          const override = overrides.get(column);
          return override ? (override[index] ?? null) : (row[column] ?? null);
        })
      ),
    }));
  }

  /** TF-IDF over the rows whose anchor the item covers; other rows get null */
  private tfidfColumn(
    item: Extract<SelectItem, { kind: 'tfidf' }>,
    tree: DocumentTree,
    rows: readonly WorkingRow[]
  ): Value[] {
    const covered = rows.map(({ anchor }) =>
      anchor !== null && (item.tags === null || item.tags.includes(anchor.tag)) ? anchor : null
    );
    const corpus = covered.flatMap((anchor) => (anchor ? [textContent(tree, anchor.id, { readableOnly: true })] : []));

    const defaults = this.config.tfidf;
    const scores = scoreTfidf(corpus, item.terms, {
      topTerms: item.options.topTerms ?? defaults.topTerms,
      minDf: item.options.minDf ?? defaults.minDf,
      maxDf: item.options.maxDf ?? defaults.maxDf,
      stopwords: item.options.stopwords ?? defaults.stopwords,
    });

    let next = 0;
    return covered.map((anchor) => (anchor ? (scores[next++] ?? null) : null));
  }

  private runStage<T>(stage: Stage, run: () => T, count: (result: T) => number): T {
    this.checkAborted(stage);
    this.options.onEvent?.({ type: 'stage-start', stage, timestamp: Date.now() });
    const end = this.logger.time(stage);

    let result: T;
    try {
      result = run();
    } catch (error) {
      if (error instanceof ExecutionError) throw error;
      const cause = toError(error);
      this.logger.error('Stage failed', cause, { stage });
      const code = cause instanceof XsqlError && cause.category === 'execution' ? cause.code : 'XSQL_E500';
      throw new ExecutionError(stage, cause, code);
    }

    const rows = count(result);
    const durationMs = end({ rows });
    this.options.onEvent?.({ type: 'stage-end', stage, timestamp: Date.now(), rows, durationMs });
    return result;
  }

  private checkAborted(stage: Stage): void {
    if (this.options.signal?.aborted) {
      this.logger.info('Statement aborted', { before: stage });
      throw new ExecutionError('aborted', new Error(`aborted before ${stage}`), 'XSQL_E501');
    }
  }
}

/**
 * Evaluate a parsed statement against a document.
 *
 * @throws {ExecutionError} naming the failed stage
 */
export function execute(statement: Statement, tree: DocumentTree | null, options: ExecuteOptions = {}): ResultSet {
  return new Executor(tree, options).execute(statement);
}
