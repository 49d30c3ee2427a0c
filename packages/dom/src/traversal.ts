/**
 * Axis walks over the node arena.
 *
 * @module traversal
 */

import { nodeAt } from './serialize.js';
import type { DocumentNode, DocumentTree } from './types.js';

export function parentOf(tree: DocumentTree, node: DocumentNode): DocumentNode | null {
  return node.parent === null ? null : nodeAt(tree, node.parent);
}

export function childrenOf(tree: DocumentTree, node: DocumentNode): DocumentNode[] {
  return node.children.map((id) => nodeAt(tree, id));
}

/** Strict ancestors, root first */
export function ancestorsOf(tree: DocumentTree, node: DocumentNode): DocumentNode[] {
  const chain: DocumentNode[] = [];
  let cursor = parentOf(tree, node);
  while (cursor) {
    chain.push(cursor);
    cursor = parentOf(tree, cursor);
  }
  return chain.reverse();
}

/** Every node below `node` in document order, `node` itself excluded */
export function descendantsOf(tree: DocumentTree, node: DocumentNode): DocumentNode[] {
  const found: DocumentNode[] = [];
  const stack = [...node.children].reverse();
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    const current = nodeAt(tree, id);
    found.push(current);
    for (let i = current.children.length - 1; i >= 0; i--) {
      const child = current.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
  return found;
}

/** First descendant with the given tag, in document order */
export function findDescendant(tree: DocumentTree, node: DocumentNode, tag: string): DocumentNode | null {
  return descendantsOf(tree, node).find((candidate) => candidate.tag === tag) ?? null;
}
