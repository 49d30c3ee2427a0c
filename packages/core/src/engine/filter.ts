/**
 * WHERE clause compilation.
 *
 * An expression is compiled once into a predicate over candidate nodes.
 * Every static check (operator against field type, regex syntax, qualifier)
 * happens at compile time, so a bad statement fails before any node is
 * visited.
 *
 * Predicates are existential over the nodes an operand's axis resolves to.
 * A null value makes every operator false except IS [NOT] NULL.
 *
 * @module engine/filter
 */

import type { DocumentNode, DocumentTree } from '@xsql/dom';
import { FilterError } from '../errors/index.js';
import { NUMERIC_FIELDS, type Expression, type Literal, type Operand } from '../lang/ast.js';
import { isDocumentName } from '../lang/parse-source.js';
import { resolveAxis } from './axes.js';
import { fieldValue } from './fields.js';

export type NodePredicate = (tree: DocumentTree, node: DocumentNode) => boolean;

export interface FilterContext {
  /** Alias bound by the statement's FROM clause */
  readonly alias: string | null;
}

/** Patterns longer than this are rejected */
const MAX_REGEX_PATTERN_LENGTH = 1000;

type ScalarTest = (value: string | number) => boolean;

export function compileFilter(expression: Expression, context: FilterContext): NodePredicate {
  switch (expression.kind) {
    case 'and': {
      const left = compileFilter(expression.left, context);
      const right = compileFilter(expression.right, context);
      return (tree, node) => left(tree, node) && right(tree, node);
    }

    case 'or': {
      const left = compileFilter(expression.left, context);
      const right = compileFilter(expression.right, context);
      return (tree, node) => left(tree, node) || right(tree, node);
    }

    case 'compare': {
      checkQualifier(expression.operand, context);
      const equals = compileEquality(expression.operand, expression.value);
      const test: ScalarTest = expression.operator === '=' ? equals : (value) => !equals(value);
      return existential(expression.operand, test);
    }

    case 'in': {
      checkQualifier(expression.operand, context);
      const tests = expression.values.map((value) => compileEquality(expression.operand, value));
      return existential(expression.operand, (value) => tests.some((test) => test(value)));
    }

    case 'regex': {
      checkQualifier(expression.operand, context);
      rejectNumeric(expression.operand, '~');
      const regex = compileRegex(expression.pattern, expression.position);
      return existential(expression.operand, (value) => regex.test(String(value)));
    }

    case 'contains': {
      checkQualifier(expression.operand, context);
      rejectNumeric(expression.operand, 'CONTAINS');
      const needles = expression.values.map((value) => value.toLowerCase());
      const test: ScalarTest =
        expression.mode === 'any'
          ? (value) => needles.some((needle) => String(value).toLowerCase().includes(needle))
          : (value) => needles.every((needle) => String(value).toLowerCase().includes(needle));
      return existential(expression.operand, test);
    }

    case 'null_check': {
      checkQualifier(expression.operand, context);
      const { operand, negated } = expression;
      return (tree, node) => {
        const nodes = resolveAxis(tree, node, operand.axis);
        if (nodes.length === 0) return !negated;
        return nodes.some((target) => (fieldValue(target, operand.field) === null) !== negated);
      };
    }

    case 'has_direct_text': {
      const { axis, tag, needle } = expression;
      const lowerNeedle = needle?.toLowerCase() ?? null;
      return (tree, node) =>
        resolveAxis(tree, node, axis).some((target) => {
          if (tag !== null && target.tag !== tag) return false;
          const direct = target.text.trim();
          if (direct === '') return false;
          return lowerNeedle === null || direct.toLowerCase().includes(lowerNeedle);
        });
    }

    case 'exists': {
      const { axis } = expression;
      const inner = expression.where ? compileFilter(expression.where, context) : null;
      return (tree, node) => resolveAxis(tree, node, axis).some((target) => inner === null || inner(tree, target));
    }
  }
}

/** WHERE clause of a FLATTEN_TEXT query, split in two */
export interface FlattenFilter {
  /** Picks base nodes; descendant-axis comparisons count as true here */
  readonly base: NodePredicate | null;
  /** All descendant-axis comparisons, tested on each flattened node itself */
  readonly descendant: NodePredicate | null;
}

type Leaf = Extract<Expression, { kind: 'compare' | 'in' | 'regex' | 'contains' | 'null_check' }>;

function isDescendantLeaf(expression: Expression): expression is Leaf {
  switch (expression.kind) {
    case 'compare':
    case 'in':
    case 'regex':
    case 'contains':
    case 'null_check':
      return expression.operand.axis === 'descendant';
    default:
      return false;
  }
}

function unsupportedDescendantFilter(message: string, leaf: Leaf): FilterError {
  return new FilterError('XSQL_F403', message, { field: fieldLabel(leaf.operand), position: leaf.operand.position });
}

function checkDescendantLeaf(leaf: Leaf): void {
  const { field } = leaf.operand;
  const onTag = field.kind === 'tag_field' && field.field === 'tag';
  const onAttribute = field.kind === 'attribute';
  const allowed =
    (leaf.kind === 'compare' && leaf.operator === '=' && (onTag || onAttribute)) ||
    (leaf.kind === 'in' && (onTag || onAttribute)) ||
    (leaf.kind === 'contains' && onAttribute);
  if (!allowed) {
    throw unsupportedDescendantFilter(
      'Descendant filters take tag (=, IN) or attributes.x (=, IN, CONTAINS) with FLATTEN_TEXT',
      leaf
    );
  }
  if (leaf.kind === 'in' && leaf.values.length === 0) {
    throw unsupportedDescendantFilter('Descendant IN filters need at least one value', leaf);
  }
}

/** Splits `expression` into the base part and the descendant leaves; null stands for true */
function splitFlatten(expression: Expression, leaves: Leaf[]): Expression | null {
  if (expression.kind === 'and') {
    const left = splitFlatten(expression.left, leaves);
    const right = splitFlatten(expression.right, leaves);
    if (left === null) return right;
    if (right === null) return left;
    return { kind: 'and', left, right };
  }
  if (expression.kind === 'or') {
    const leaf = findDescendantLeaf(expression);
    if (leaf) throw unsupportedDescendantFilter('Descendant filters cannot be combined with OR when using FLATTEN_TEXT', leaf);
    return expression;
  }
  if (isDescendantLeaf(expression)) {
    checkDescendantLeaf(expression);
    leaves.push(expression);
    return null;
  }
  return expression;
}

function findDescendantLeaf(expression: Expression): Leaf | null {
  if (expression.kind === 'and' || expression.kind === 'or') {
    return findDescendantLeaf(expression.left) ?? findDescendantLeaf(expression.right);
  }
  return isDescendantLeaf(expression) ? expression : null;
}

/**
 * Compile the WHERE clause of a FLATTEN_TEXT query. Comparisons on the
 * descendant axis choose which descendants are flattened instead of which
 * base nodes are kept.
 *
 * @throws {FilterError} XSQL_F403 for a descendant comparison FLATTEN_TEXT cannot apply
 */
export function compileFlattenFilter(expression: Expression, context: FilterContext): FlattenFilter {
  const leaves: Leaf[] = [];
  const rest = splitFlatten(expression, leaves);
  const tests = leaves.map((leaf) => {
    const operand: Operand = { ...leaf.operand, axis: 'self' };
    return compileFilter({ ...leaf, operand }, context);
  });
  return {
    base: rest === null ? null : compileFilter(rest, context),
    descendant: tests.length === 0 ? null : (tree, node) => tests.every((test) => test(tree, node)),
  };
}

/** Values an operand yields for one node; `attributes` yields every attribute value */
function scalarsOf(node: DocumentNode, operand: Operand): (string | number)[] {
  if (operand.field.kind === 'attributes') {
    return [...node.attributes.values()];
  }
  const value = fieldValue(node, operand.field);
  return typeof value === 'string' || typeof value === 'number' ? [value] : [];
}

function existential(operand: Operand, test: ScalarTest): NodePredicate {
  return (tree, node) =>
    resolveAxis(tree, node, operand.axis).some((target) => scalarsOf(target, operand).some(test));
}

function isNumericOperand(operand: Operand): boolean {
  return operand.field.kind === 'tag_field' && NUMERIC_FIELDS.has(operand.field.field);
}

function fieldLabel(operand: Operand): string {
  switch (operand.field.kind) {
    case 'tag_field':
      return operand.field.field;
    case 'attributes':
      return 'attributes';
    case 'attribute':
      return `attributes.${operand.field.name}`;
  }
}

function rejectNumeric(operand: Operand, operator: string): void {
  if (isNumericOperand(operand)) {
    throw new FilterError('XSQL_F400', `${operator} cannot be applied to numeric field '${fieldLabel(operand)}'`, {
      field: fieldLabel(operand),
      operator,
      position: operand.position,
    });
  }
}

function compileEquality(operand: Operand, literal: Literal): ScalarTest {
  if (isNumericOperand(operand)) {
    const expected = typeof literal === 'number' ? literal : Number(literal.trim() === '' ? Number.NaN : literal);
    if (!Number.isFinite(expected)) {
      throw new FilterError(
        'XSQL_F400',
        `Numeric field '${fieldLabel(operand)}' cannot be compared with '${literal}'`,
        { field: fieldLabel(operand), value: literal, position: operand.position }
      );
    }
    return (value) => value === expected;
  }

  if (operand.field.kind === 'tag_field' && operand.field.field === 'tag') {
    const expected = String(literal).toLowerCase();
    return (value) => String(value).toLowerCase() === expected;
  }

  const expected = String(literal);
  return (value) => String(value) === expected;
}

function compileRegex(pattern: string, position: number): RegExp {
  if (pattern.length > MAX_REGEX_PATTERN_LENGTH) {
    throw new FilterError('XSQL_F401', `Regular expression is longer than ${MAX_REGEX_PATTERN_LENGTH} characters`, {
      position,
    });
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new FilterError('XSQL_F401', `Invalid regular expression '${pattern}': ${cause.message}`, { pattern, position }, cause);
  }
}

function checkQualifier(operand: Operand, context: FilterContext): void {
  const { qualifier } = operand;
  if (qualifier === null || isDocumentName(qualifier) || qualifier === context.alias) return;
  throw new FilterError('XSQL_F402', `Unknown qualifier '${qualifier}'`, {
    qualifier,
    alias: context.alias,
    position: operand.position,
  });
}
