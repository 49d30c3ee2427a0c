/**
 * Field extraction from document nodes.
 *
 * @module engine/fields
 */

import type { DocumentNode, DocumentTree } from '@xsql/dom';
import type { FieldRef, IntrinsicField, NodeColumn } from '../lang/ast.js';
import type { Value } from './values.js';

export function intrinsicValue(node: DocumentNode, field: IntrinsicField): string | number | null {
  switch (field) {
    case 'tag':
      return node.tag;
    case 'text':
      return node.text;
    case 'node_id':
    case 'doc_order':
      return node.id;
    case 'parent_id':
      return node.parent;
    case 'sibling_pos':
      return node.siblingPos;
    case 'max_depth':
      return node.maxDepth;
  }
}

/** Attribute list as `[name, value]` pairs, null when the node has none */
export function attributeList(node: DocumentNode): Value[] | null {
  if (node.attributes.size === 0) return null;
  return [...node.attributes].map(([name, value]) => [name, value]);
}

export function fieldValue(node: DocumentNode, ref: FieldRef): Value {
  switch (ref.kind) {
    case 'tag_field':
      return intrinsicValue(node, ref.field);
    case 'attributes':
      return attributeList(node);
    case 'attribute':
      return node.attributes.get(ref.name) ?? null;
  }
}

export function nodeColumnValue(tree: DocumentTree, node: DocumentNode, column: NodeColumn): Value {
  switch (column) {
    case 'attributes':
      return attributeList(node);
    case 'source_uri':
      return tree.sourceUri;
    default:
      return intrinsicValue(node, column);
  }
}
