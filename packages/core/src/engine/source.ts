/**
 * FROM clause resolution.
 *
 * @module engine/source
 */

import { mergeTrees, outerHtml, parseHtml, type DocumentTree } from '@xsql/dom';
import { SourceError } from '../errors/index.js';
import type { SelectQuery, Source } from '../lang/ast.js';
import type { WorkingRow } from './order.js';
import { isNodeSelect } from './projection.js';

/** Reads a local file as UTF-8 text */
export type ReadFile = (path: string) => string;

export interface SourceContext {
  /** The input document, null when none is loaded */
  readonly document: DocumentTree | null;
  /** Aliases registered on the engine */
  readonly aliases: ReadonlyMap<string, DocumentTree>;
  readonly readFile: ReadFile;
  /** Runs a FRAGMENTS subquery */
  readonly runSubquery: (query: SelectQuery) => SubqueryResult;
}

export interface SubqueryResult {
  readonly columns: readonly string[];
  readonly rows: readonly WorkingRow[];
  /** Tree the subquery ran against, null when it was empty */
  readonly tree: DocumentTree | null;
}

export interface ResolvedSource {
  /** Null when FRAGMENTS produced no fragments */
  readonly tree: DocumentTree | null;
  readonly alias: string | null;
}

const URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

function requireDocument(context: SourceContext): DocumentTree {
  if (!context.document) {
    throw new SourceError('XSQL_S301', 'No input document is loaded');
  }
  return context.document;
}

function loadLocation(location: string, context: SourceContext): DocumentTree {
  if (location.trim().startsWith('<')) {
    return parseHtml(location);
  }
  if (URL_PATTERN.test(location)) {
    throw new SourceError('XSQL_S303', `Cannot fetch '${location}': network sources are not supported`, {
      location,
    });
  }

  let markup: string;
  try {
    markup = context.readFile(location);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SourceError('XSQL_S301', `Cannot read '${location}': ${cause.message}`, { location }, cause);
  }
  return parseHtml(markup, { sourceUri: location });
}

function fragmentMarkup(query: SelectQuery, context: SourceContext): string[] {
  const { columns, rows, tree } = context.runSubquery(query);

  if (isNodeSelect(query.items)) {
    return tree ? rows.flatMap(({ anchor }) => (anchor ? [outerHtml(tree, anchor.id)] : [])) : [];
  }

  const [column] = columns;
  if (columns.length !== 1 || column === undefined) {
    throw new SourceError('XSQL_S302', `FRAGMENTS subquery must return one column, got ${columns.length}`, {
      columns: [...columns],
    });
  }

  return rows.flatMap(({ row }) => {
    const value = row[column] ?? null;
    if (value === null) return [];
    if (typeof value !== 'string') {
      throw new SourceError('XSQL_S302', `FRAGMENTS subquery returned a non-string value in '${column}'`, { column });
    }
    return [value];
  });
}

function fragmentTrees(markup: readonly string[]): DocumentTree | null {
  if (markup.length === 0) return null;
  return mergeTrees(markup.map((fragment) => parseHtml(fragment)));
}

/**
 * Resolve the source of a SELECT into the tree it runs against.
 *
 * @throws {SourceError} for an unknown alias, an unreadable path, a URL or bad fragments
 */
export function resolveSource(source: Source, context: SourceContext): ResolvedSource {
  switch (source.kind) {
    case 'document':
      return { tree: requireDocument(context), alias: source.alias };

    case 'location':
      return { tree: loadLocation(source.location, context), alias: null };

    case 'raw':
      return { tree: parseHtml(source.markup), alias: null };

    case 'fragments': {
      const markup =
        source.input.kind === 'raw' ? [source.input.markup] : fragmentMarkup(source.input.query, context);
      return { tree: fragmentTrees(markup), alias: source.alias };
    }

    case 'alias': {
      const tree = context.aliases.get(source.name);
      if (!tree) {
        throw new SourceError('XSQL_S300', `Unknown source alias '${source.name}'`, {
          alias: source.name,
          position: source.position,
        });
      }
      return { tree, alias: source.name };
    }
  }
}
