/**
 * Axis resolution relative to a candidate node.
 *
 * @module engine/axes
 */

import { ancestorsOf, childrenOf, descendantsOf, parentOf, type DocumentNode, type DocumentTree } from '@xsql/dom';
import type { Axis } from '../lang/ast.js';

/**
 * Nodes reached from `node` along `axis`, in document order.
 * `ancestor` is strict and root first; `descendant` excludes the node itself.
 */
export function resolveAxis(tree: DocumentTree, node: DocumentNode, axis: Axis): DocumentNode[] {
  switch (axis) {
    case 'self':
      return [node];
    case 'parent': {
      const parent = parentOf(tree, node);
      return parent ? [parent] : [];
    }
    case 'child':
      return childrenOf(tree, node);
    case 'ancestor':
      return ancestorsOf(tree, node);
    case 'descendant':
      return descendantsOf(tree, node);
  }
}
