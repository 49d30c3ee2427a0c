/**
 * XsqlEngine - holds the input document, registered aliases and validated
 * configuration, and publishes pipeline progress on `events$`.
 *
 * @module engine/engine
 */

import type { DocumentTree } from '@xsql/dom';
import { type Observable, Subject, takeUntil } from 'rxjs';
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config.js';
import { type Statement } from '../lang/ast.js';
import { parseQuery } from '../lang/parser.js';
import { createLogger, type XsqlLogger } from '../observability/index.js';
import { Executor, type ExecutionEvent } from './executor.js';
import type { ReadFile } from './source.js';
import type { ResultSet } from './values.js';

export interface XsqlEngineOptions {
  readonly config?: EngineConfigInput;
  /** Input document for `FROM document` */
  readonly document?: DocumentTree | null;
  readonly readFile?: ReadFile;
  /** Overrides the logger built from `config.logger` */
  readonly logger?: XsqlLogger;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
}

/**
 * Query engine.
 *
 * @example
 * ```typescript
 * const engine = createXsqlEngine({ document: parseHtml(markup) });
 * engine.events$.subscribe((event) => console.log(event.type, event.stage));
 *
 * const result = engine.query("SELECT a.href FROM doc WHERE href IS NOT NULL");
 * ```
 */
export class XsqlEngine {
  readonly config: EngineConfig;

  private readonly events = new Subject<ExecutionEvent>();
  private readonly destroy$ = new Subject<void>();
  private readonly aliases = new Map<string, DocumentTree>();
  private readonly logger: XsqlLogger;
  private document: DocumentTree | null;

  constructor(private readonly options: XsqlEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.document = options.document ?? null;
    this.logger =
      options.logger ?? createLogger({ module: 'xsql', level: this.config.logger.level, json: this.config.logger.json });
  }

  /** Stage start/end events of every statement this engine runs */
  get events$(): Observable<ExecutionEvent> {
    return this.events.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Replace the input document */
  load(document: DocumentTree | null): void {
    this.document = document;
    this.logger.debug('Document loaded', { sourceUri: document?.sourceUri ?? null, nodes: document?.nodes.length ?? 0 });
  }

  getDocument(): DocumentTree | null {
    return this.document;
  }

  /** Register a tree under a name usable as `FROM name` */
  bind(name: string, tree: DocumentTree): void {
    this.aliases.set(name, tree);
  }

  unbind(name: string): boolean {
    return this.aliases.delete(name);
  }

  /** Parse and run one statement */
  query(text: string, options: RunOptions = {}): ResultSet {
    return this.execute(parseQuery(text), options);
  }

  execute(statement: Statement, options: RunOptions = {}): ResultSet {
    const executor = new Executor(this.document, {
      signal: options.signal,
      aliases: this.aliases,
      readFile: this.options.readFile,
      config: this.config,
      logger: this.logger,
      onEvent: (event) => this.events.next(event),
    });
    return executor.execute(statement);
  }

  destroy(): void {
    this.destroy$.next();
    this.destroy$.complete();
    this.events.complete();
    this.aliases.clear();
  }
}

export function createXsqlEngine(options?: XsqlEngineOptions): XsqlEngine {
  return new XsqlEngine(options);
}
