/**
 * XSQL abstract syntax tree.
 *
 * Every grammar production is a closed tagged union so that evaluators can
 * switch on `kind` exhaustively. Parsed trees are frozen.
 *
 * @module lang/ast
 */

export type Axis = 'self' | 'parent' | 'child' | 'ancestor' | 'descendant';

export const AXES: readonly Exclude<Axis, 'self'>[] = ['parent', 'child', 'ancestor', 'descendant'];

export const INTRINSIC_FIELDS = [
  'tag',
  'text',
  'node_id',
  'parent_id',
  'sibling_pos',
  'max_depth',
  'doc_order',
] as const;

export type IntrinsicField = (typeof INTRINSIC_FIELDS)[number];

export const NUMERIC_FIELDS: ReadonlySet<IntrinsicField> = new Set<IntrinsicField>([
  'node_id',
  'parent_id',
  'sibling_pos',
  'max_depth',
  'doc_order',
]);

/** Columns produced by bare tag items and `*` */
export const NODE_COLUMNS = [
  'node_id',
  'tag',
  'attributes',
  'parent_id',
  'sibling_pos',
  'max_depth',
  'doc_order',
  'source_uri',
] as const;

export type NodeColumn = (typeof NODE_COLUMNS)[number];

export function isIntrinsicField(name: string): name is IntrinsicField {
  return INTRINSIC_FIELDS.some((field) => field === name);
}

export function isNodeColumn(name: string): name is NodeColumn {
  return NODE_COLUMNS.some((column) => column === name);
}

// ─── Field references ───────────────────────────────────────────────────────

export type FieldRef =
  | { readonly kind: 'tag_field'; readonly field: IntrinsicField }
  | { readonly kind: 'attributes' }
  | { readonly kind: 'attribute'; readonly name: string };

export interface Operand {
  readonly qualifier: string | null;
  readonly axis: Axis;
  readonly field: FieldRef;
  readonly position: number;
}

// ─── WHERE expressions ──────────────────────────────────────────────────────

export type Literal = string | number;

export type Expression =
  | { readonly kind: 'and'; readonly left: Expression; readonly right: Expression }
  | { readonly kind: 'or'; readonly left: Expression; readonly right: Expression }
  | {
      readonly kind: 'compare';
      readonly operator: '=' | '<>';
      readonly operand: Operand;
      readonly value: Literal;
    }
  | { readonly kind: 'in'; readonly operand: Operand; readonly values: readonly Literal[] }
  | { readonly kind: 'regex'; readonly operand: Operand; readonly pattern: string; readonly position: number }
  | {
      readonly kind: 'contains';
      readonly mode: 'one' | 'all' | 'any';
      readonly operand: Operand;
      readonly values: readonly string[];
    }
  | { readonly kind: 'null_check'; readonly negated: boolean; readonly operand: Operand }
  | {
      readonly kind: 'has_direct_text';
      readonly axis: Axis;
      /** null matches any tag */
      readonly tag: string | null;
      readonly needle: string | null;
    }
  | {
      readonly kind: 'exists';
      readonly axis: Axis;
      /** Evaluated with each axis node as the candidate; null accepts any node */
      readonly where: Expression | null;
    };

// ─── Select items ───────────────────────────────────────────────────────────

export interface TfidfOptions {
  readonly topTerms: number | null;
  readonly minDf: number | null;
  readonly maxDf: number | null;
  readonly stopwords: 'english' | 'none' | null;
}

/**
 * One column (or, for `node`, the identity column set) of the select list.
 * `tag` null on a projection means "the candidate itself"; on `node`, `count`
 * and `tfidf` it means `*`.
 */
export type SelectItem =
  | { readonly kind: 'node'; readonly tag: string | null }
  | {
      readonly kind: 'field';
      readonly name: string;
      readonly tag: string | null;
      readonly field: FieldRef;
      readonly trim: boolean;
    }
  | { readonly kind: 'text'; readonly name: string; readonly tag: string; readonly trim: boolean }
  | {
      readonly kind: 'inner_html';
      readonly name: string;
      readonly tag: string;
      readonly maxLength: number | null;
      readonly trim: boolean;
    }
  | { readonly kind: 'count'; readonly name: string; readonly tag: string | null }
  | { readonly kind: 'summarize'; readonly name: string }
  | {
      readonly kind: 'tfidf';
      readonly name: string;
      readonly tags: readonly string[] | null;
      readonly terms: readonly string[];
      readonly options: TfidfOptions;
    }
  | {
      readonly kind: 'flatten_text';
      readonly tag: string;
      /** Exact level below the base node; null takes every descendant */
      readonly depth: number | null;
      /** One output column per flattened value, filled left to right */
      readonly columns: readonly string[];
    };

export type ProjectionItem = Exclude<SelectItem, { kind: 'node' }>;

/** Result columns one select item contributes */
export function itemColumns(item: ProjectionItem): readonly string[] {
  return item.kind === 'flatten_text' ? item.columns : [item.name];
}

export function isAggregateItem(item: SelectItem): boolean {
  return item.kind === 'count' || item.kind === 'tfidf';
}

// ─── Sources ────────────────────────────────────────────────────────────────

export type FragmentInput =
  | { readonly kind: 'raw'; readonly markup: string }
  | { readonly kind: 'query'; readonly query: SelectQuery };

export type Source =
  | { readonly kind: 'document'; readonly alias: string | null }
  | { readonly kind: 'location'; readonly location: string }
  | { readonly kind: 'raw'; readonly markup: string }
  | { readonly kind: 'fragments'; readonly input: FragmentInput; readonly alias: string | null }
  | { readonly kind: 'alias'; readonly name: string; readonly position: number };

// ─── Clauses ────────────────────────────────────────────────────────────────

export interface OrderItem {
  readonly key: string;
  readonly direction: 'asc' | 'desc';
  readonly position: number;
}

export type OutputClause =
  | { readonly kind: 'list' }
  | { readonly kind: 'table'; readonly header: boolean; readonly exportPath: string | null }
  | { readonly kind: 'csv'; readonly path: string }
  | { readonly kind: 'parquet'; readonly path: string };

// ─── Statements ─────────────────────────────────────────────────────────────

export interface SelectQuery {
  readonly kind: 'select';
  readonly items: readonly SelectItem[];
  readonly exclude: readonly NodeColumn[];
  readonly source: Source;
  readonly where: Expression | null;
  readonly orderBy: readonly OrderItem[];
  readonly limit: number | null;
  readonly output: OutputClause | null;
}

export type ShowTarget = 'input' | 'inputs' | 'functions' | 'axes' | 'operators';

export interface ShowQuery {
  readonly kind: 'show';
  readonly target: ShowTarget;
}

export type DescribeTarget = 'document' | 'language';

export interface DescribeQuery {
  readonly kind: 'describe';
  readonly target: DescribeTarget;
}

export type Statement = SelectQuery | ShowQuery | DescribeQuery;
