/**
 * Builds a {@link DocumentTree} from raw markup using htmlparser2.
 *
 * The tokenizer is forgiving but not browser-grade: no implied html/head/body
 * elements are inserted, and unclosed elements are closed at the end of input.
 *
 * @module parse-html
 */

import { Parser } from 'htmlparser2';
import type { ContentSegment, DocumentNode, DocumentTree, ParseHtmlOptions } from './types.js';

interface NodeDraft {
  id: number;
  tag: string;
  attributes: Map<string, string>;
  children: number[];
  content: ContentSegment[];
  parent: number | null;
  depth: number;
  siblingPos: number;
}

/**
 * Parse markup into a read-only document tree.
 *
 * @example
 * ```typescript
 * const tree = parseHtml('<ul><li>one</li><li>two</li></ul>');
 * tree.nodes.map((n) => n.tag); // ['ul', 'li', 'li']
 * ```
 */
export function parseHtml(raw: string, options: ParseHtmlOptions = {}): DocumentTree {
  const drafts: NodeDraft[] = [];
  const roots: number[] = [];
  const open: number[] = [];

  const current = (): NodeDraft | undefined => {
    const top = open[open.length - 1];
    return top === undefined ? undefined : drafts[top];
  };

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        const parent = current();
        const siblings = parent ? parent.children : roots;
        const draft: NodeDraft = {
          id: drafts.length,
          tag: name.toLowerCase(),
          attributes: new Map(Object.entries(attribs)),
          children: [],
          content: [],
          parent: parent ? parent.id : null,
          depth: open.length,
          siblingPos: siblings.length + 1,
        };
        drafts.push(draft);
        siblings.push(draft.id);
        parent?.content.push({ kind: 'element', id: draft.id });
        open.push(draft.id);
      },
      ontext(data) {
        const parent = current();
        if (!parent) return;
        const last = parent.content[parent.content.length - 1];
        if (last?.kind === 'text') {
          parent.content[parent.content.length - 1] = { kind: 'text', value: last.value + data };
        } else {
          parent.content.push({ kind: 'text', value: data });
        }
      },
      oncomment(data) {
        current()?.content.push({ kind: 'comment', value: data });
      },
      onclosetag() {
        open.pop();
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );
  parser.write(raw);
  parser.end();

  return freezeTree(drafts, roots, options.sourceUri ?? null);
}

function freezeTree(drafts: NodeDraft[], roots: number[], sourceUri: string | null): DocumentTree {
  const heights = new Array<number>(drafts.length).fill(0);
  for (let i = drafts.length - 1; i >= 0; i--) {
    const draft = drafts[i];
    if (!draft || draft.parent === null) continue;
    heights[draft.parent] = Math.max(heights[draft.parent] ?? 0, (heights[i] ?? 0) + 1);
  }

  const nodes = drafts.map(
    (draft): DocumentNode =>
      Object.freeze({
        id: draft.id,
        tag: draft.tag,
        attributes: draft.attributes,
        text: draft.content
          .map((segment) => (segment.kind === 'text' ? segment.value : ''))
          .join(''),
        children: Object.freeze(draft.children),
        content: Object.freeze(draft.content),
        parent: draft.parent,
        depth: draft.depth,
        siblingPos: draft.siblingPos,
        maxDepth: heights[draft.id] ?? 0,
      })
  );

  return Object.freeze({
    nodes: Object.freeze(nodes),
    roots: Object.freeze(roots),
    sourceUri,
  });
}

/**
 * Combine independently parsed trees into one, keeping every input root as a
 * root of the result. Node ids are shifted so that document order is the
 * concatenation of the inputs.
 */
export function mergeTrees(trees: readonly DocumentTree[], sourceUri: string | null = null): DocumentTree {
  const nodes: DocumentNode[] = [];
  const roots: number[] = [];

  for (const tree of trees) {
    const offset = nodes.length;
    const shift = (id: number): number => id + offset;
    for (const node of tree.nodes) {
      nodes.push(
        Object.freeze({
          ...node,
          id: shift(node.id),
          parent: node.parent === null ? null : shift(node.parent),
          siblingPos: node.parent === null ? roots.length + tree.roots.indexOf(node.id) + 1 : node.siblingPos,
          children: Object.freeze(node.children.map(shift)),
          content: Object.freeze(
            node.content.map(
              (segment): ContentSegment =>
                segment.kind === 'element' ? { kind: 'element', id: shift(segment.id) } : segment
            )
          ),
        })
      );
    }
    roots.push(...tree.roots.map(shift));
  }

  return Object.freeze({ nodes: Object.freeze(nodes), roots: Object.freeze(roots), sourceUri });
}
