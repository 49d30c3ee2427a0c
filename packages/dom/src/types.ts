/**
 * Document tree types.
 *
 * A document is an arena of element nodes stored in preorder. Nodes refer to
 * each other by index: `parent` and `children` are positions in
 * {@link DocumentTree.nodes}, so walking up the tree never follows an owning
 * reference.
 *
 * @module types
 */

/** One piece of an element's content, in document order */
export type ContentSegment =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'element'; readonly id: number }
  | { readonly kind: 'comment'; readonly value: string };

/** An element node */
export interface DocumentNode {
  /** Preorder index, equal to the node's position in the arena */
  readonly id: number;
  /** Lower-case tag name */
  readonly tag: string;
  /** Attributes in source order */
  readonly attributes: ReadonlyMap<string, string>;
  /** The node's own text segments joined, descendants excluded */
  readonly text: string;
  /** Element children in document order */
  readonly children: readonly number[];
  readonly content: readonly ContentSegment[];
  /** Parent index, null for a root */
  readonly parent: number | null;
  /** Number of element ancestors */
  readonly depth: number;
  /** 1-based position among element siblings */
  readonly siblingPos: number;
  /** Height of the element subtree below this node (0 for a leaf) */
  readonly maxDepth: number;
}

/** A parsed document */
export interface DocumentTree {
  readonly nodes: readonly DocumentNode[];
  /** Top-level elements in document order */
  readonly roots: readonly number[];
  /** Where the markup came from, null for inline markup */
  readonly sourceUri: string | null;
}

export interface ParseHtmlOptions {
  readonly sourceUri?: string | null;
}
