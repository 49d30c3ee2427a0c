/**
 * Candidate selection and per-row projection.
 *
 * Projections are pure functions of (candidate, document, item). A projection
 * naming a tag reads the candidate when its tag matches, otherwise the first
 * descendant with that tag, otherwise yields null.
 *
 * @module engine/projection
 */

import {
  descendantsOf,
  findDescendant,
  innerHtml,
  textContent,
  type DocumentNode,
  type DocumentTree,
} from '@xsql/dom';
import { NODE_COLUMNS, itemColumns, type NodeColumn, type SelectItem } from '../lang/ast.js';
import { fieldValue, nodeColumnValue } from './fields.js';
import type { NodePredicate } from './filter.js';
import { summarizeText } from './text-analysis.js';
import type { Value } from './values.js';

/**
 * Tags the select list restricts candidates to; null when any item lifts the
 * restriction (`*`, `COUNT(*)`, `SUMMARIZE(*)`, `TFIDF(*)`, `attributes.x`).
 */
export function candidateTags(items: readonly SelectItem[]): ReadonlySet<string> | null {
  const tags = new Set<string>();
  for (const item of items) {
    switch (item.kind) {
      case 'summarize':
        return null;
      case 'tfidf':
        if (item.tags === null) return null;
        item.tags.forEach((tag) => tags.add(tag));
        break;
      default:
        if (item.tag === null) return null;
        tags.add(item.tag);
    }
  }
  return tags;
}

export function selectCandidates(tree: DocumentTree, items: readonly SelectItem[]): DocumentNode[] {
  const tags = candidateTags(items);
  return tags === null ? [...tree.nodes] : tree.nodes.filter((node) => tags.has(node.tag));
}

export function isNodeSelect(items: readonly SelectItem[]): boolean {
  return items.every((item) => item.kind === 'node');
}

/** Identity columns left after EXCLUDE */
export function nodeColumns(exclude: readonly NodeColumn[]): NodeColumn[] {
  return NODE_COLUMNS.filter((column) => !exclude.includes(column));
}

export function resultColumns(items: readonly SelectItem[], exclude: readonly NodeColumn[]): string[] {
  if (isNodeSelect(items)) return nodeColumns(exclude);
  return items.flatMap((item) => (item.kind === 'node' ? [] : itemColumns(item)));
}

export interface ProjectionOptions {
  readonly summaryLength: number;
  /** Descendants FLATTEN_TEXT keeps; null keeps all */
  readonly flattenFilter?: NodePredicate | null;
}

function readTarget(tree: DocumentTree, node: DocumentNode, tag: string | null): DocumentNode | null {
  if (tag === null || node.tag === tag) return node;
  return findDescendant(tree, node, tag);
}

function normalizeSpace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

function flattenTargets(tree: DocumentTree, node: DocumentNode, depth: number | null): DocumentNode[] {
  if (depth === null) return descendantsOf(tree, node);
  if (depth === 0) return [node];
  return descendantsOf(tree, node).filter((descendant) => descendant.depth === node.depth + depth);
}

/**
 * Texts of the descendants FLATTEN_TEXT turns into columns, in document
 * order. Each is the node's own text, or its inline text when it has none.
 * Without a depth, empty texts are skipped.
 */
export function flattenTexts(
  tree: DocumentTree,
  node: DocumentNode,
  depth: number | null,
  filter: NodePredicate | null
): string[] {
  const texts: string[] = [];
  for (const target of flattenTargets(tree, node, depth)) {
    if (filter && !filter(tree, target)) continue;
    let text = normalizeSpace(target.text);
    if (text === '') text = normalizeSpace(textContent(tree, target.id, { inlineOnly: true }));
    if (depth === null && text === '') continue;
    texts.push(text);
  }
  return texts;
}

function trimmed(value: Value, trim: boolean): Value {
  return trim && typeof value === 'string' ? value.trim() : value;
}

/**
 * Values of one candidate, one per result column. COUNT and TFIDF columns
 * are left null here; the aggregate stage fills them in. FLATTEN_TEXT pads
 * its columns with null.
 */
export function projectNode(
  tree: DocumentTree,
  node: DocumentNode,
  items: readonly SelectItem[],
  exclude: readonly NodeColumn[],
  options: ProjectionOptions
): Value[] {
  if (isNodeSelect(items)) {
    return nodeColumns(exclude).map((column) => nodeColumnValue(tree, node, column));
  }

  const values: Value[] = [];
  for (const item of items) {
    switch (item.kind) {
      case 'node':
        break;
      case 'field': {
        const target = readTarget(tree, node, item.tag);
        values.push(target ? trimmed(fieldValue(target, item.field), item.trim) : null);
        break;
      }
      case 'text': {
        const target = readTarget(tree, node, item.tag);
        values.push(target ? trimmed(textContent(tree, target.id), item.trim) : null);
        break;
      }
      case 'inner_html': {
        const target = readTarget(tree, node, item.tag);
        if (!target) {
          values.push(null);
          break;
        }
        const markup = innerHtml(tree, target.id);
        const clipped = item.maxLength === null ? markup : Array.from(markup).slice(0, item.maxLength).join('');
        values.push(trimmed(clipped, item.trim));
        break;
      }
      case 'summarize':
        values.push(summarizeText(textContent(tree, node.id, { readableOnly: true }), options.summaryLength));
        break;
      case 'flatten_text': {
        const texts = flattenTexts(tree, node, item.depth, options.flattenFilter ?? null);
        item.columns.forEach((_, index) => values.push(texts[index] ?? null));
        break;
      }
      case 'count':
      case 'tfidf':
        values.push(null);
        break;
    }
  }
  return values;
}
