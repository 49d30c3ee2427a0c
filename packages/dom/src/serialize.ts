/**
 * Markup and text serialisation for document nodes.
 *
 * @module serialize
 */

import type { DocumentNode, DocumentTree } from './types.js';

const VOID_TAGS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

/** Elements whose content is raw text (not entity-decoded, not escaped) */
const RAW_TEXT_TAGS = new Set(['script', 'style']);

/** Elements skipped when collecting readable text */
const NON_CONTENT_TAGS = new Set(['script', 'style', 'noscript']);

/** Phrasing elements whose text reads as part of the surrounding line */
const INLINE_TAGS = new Set([
  'a',
  'abbr',
  'b',
  'bdi',
  'bdo',
  'br',
  'cite',
  'code',
  'data',
  'dfn',
  'em',
  'i',
  'kbd',
  'mark',
  'q',
  'rp',
  'rt',
  'ruby',
  's',
  'samp',
  'small',
  'span',
  'strong',
  'sub',
  'sup',
  'time',
  'u',
  'var',
  'wbr',
]);

export interface TextContentOptions {
  /** Leave out script, style and noscript content */
  readonly readableOnly?: boolean;
  /** Only descend into inline elements such as span, a or em */
  readonly inlineOnly?: boolean;
}

export function isVoidTag(tag: string): boolean {
  return VOID_TAGS.has(tag);
}

export function isInlineTag(tag: string): boolean {
  return INLINE_TAGS.has(tag);
}

export function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}

/** Look up a node, failing loudly on a dangling index */
export function nodeAt(tree: DocumentTree, id: number): DocumentNode {
  const node = tree.nodes[id];
  if (!node) {
    throw new RangeError(`Node ${id} is not part of this document`);
  }
  return node;
}

/** Serialise the markup inside a node */
export function innerHtml(tree: DocumentTree, id: number): string {
  const node = nodeAt(tree, id);
  const raw = RAW_TEXT_TAGS.has(node.tag);
  let out = '';
  for (const segment of node.content) {
    switch (segment.kind) {
      case 'text':
        out += raw ? segment.value : escapeText(segment.value);
        break;
      case 'comment':
        out += `<!--${segment.value}-->`;
        break;
      case 'element':
        out += outerHtml(tree, segment.id);
        break;
    }
  }
  return out;
}

/** Serialise a node including its own tags */
export function outerHtml(tree: DocumentTree, id: number): string {
  const node = nodeAt(tree, id);
  let open = `<${node.tag}`;
  for (const [name, value] of node.attributes) {
    open += ` ${name}="${escapeAttribute(value)}"`;
  }
  open += '>';
  if (isVoidTag(node.tag)) return open;
  return `${open}${innerHtml(tree, id)}</${node.tag}>`;
}

/** All text below a node, in document order */
export function textContent(tree: DocumentTree, id: number, options: TextContentOptions = {}): string {
  const node = nodeAt(tree, id);
  if (options.readableOnly && NON_CONTENT_TAGS.has(node.tag)) return '';
  let out = '';
  for (const segment of node.content) {
    if (segment.kind === 'text') {
      out += segment.value;
    } else if (segment.kind === 'element') {
      if (options.inlineOnly && !isInlineTag(nodeAt(tree, segment.id).tag)) continue;
      out += textContent(tree, segment.id, options);
    }
  }
  return out;
}
