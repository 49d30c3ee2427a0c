/**
 * WHERE expression sub-parser.
 *
 * ```
 * expr     = and_expr (OR and_expr)*
 * and_expr = cmp_expr (AND cmp_expr)*
 * cmp_expr = '(' expr ')' | EXISTS '(' axis [WHERE expr] ')'
 *          | [axis '.'] (tag | '*') HAS_DIRECT_TEXT [string] | operand cmp_op
 * ```
 *
 * @module lang/parse-expression
 */

import { AXES, isIntrinsicField, type Axis, type Expression, type FieldRef, type Literal, type Operand } from './ast.js';
import type { TokenCursor } from './cursor.js';
import type { Token } from './tokens.js';

function axisOf(token: Token): Exclude<Axis, 'self'> | null {
  if (token.type !== 'IDENTIFIER') return null;
  const lower = token.value.toLowerCase();
  return AXES.find((axis) => axis === lower) ?? null;
}

export function parseExpression(c: TokenCursor): Expression {
  let left = parseAnd(c);
  while (c.matchAndAdvance('OR')) {
    left = { kind: 'or', left, right: parseAnd(c) };
  }
  return left;
}

function parseAnd(c: TokenCursor): Expression {
  let left = parseComparison(c);
  while (c.matchAndAdvance('AND')) {
    left = { kind: 'and', left, right: parseComparison(c) };
  }
  return left;
}

function parseComparison(c: TokenCursor): Expression {
  if (c.matchAndAdvance('LPAREN')) {
    const inner = parseExpression(c);
    c.expect('RPAREN', "')'");
    return inner;
  }

  if (c.checkWord('EXISTS') && c.peek().type === 'LPAREN') {
    return parseExists(c);
  }

  const directText = tryParseHasDirectText(c);
  if (directText) return directText;

  const operand = parseOperand(c);
  const token = c.current();

  switch (token.type) {
    case 'EQ':
    case 'NE':
      c.advance();
      return { kind: 'compare', operator: token.type === 'EQ' ? '=' : '<>', operand, value: parseLiteral(c) };

    case 'IN':
      c.advance();
      return { kind: 'in', operand, values: parseLiteralList(c) };

    case 'TILDE': {
      c.advance();
      const position = c.current().position;
      return { kind: 'regex', operand, pattern: c.expectString('regex pattern string'), position };
    }

    case 'CONTAINS':
      c.advance();
      if (c.matchAndAdvance('ALL')) {
        return { kind: 'contains', mode: 'all', operand, values: parseLiteralList(c).map(String) };
      }
      if (c.matchAndAdvance('ANY')) {
        return { kind: 'contains', mode: 'any', operand, values: parseLiteralList(c).map(String) };
      }
      if (c.check('LPAREN')) {
        const listStart = c.current();
        const values = parseLiteralList(c);
        if (values.length !== 1) {
          throw c.violation(
            'CONTAINS with a list of values requires ALL or ANY',
            listStart,
            'XSQL_P200'
          );
        }
        return { kind: 'contains', mode: 'one', operand, values: values.map(String) };
      }
      return { kind: 'contains', mode: 'one', operand, values: [String(parseLiteral(c))] };

    case 'IS': {
      c.advance();
      const negated = c.matchAndAdvance('NOT');
      c.expect('NULL', 'NULL');
      return { kind: 'null_check', negated, operand };
    }

    default:
      throw c.error('comparison operator');
  }
}

/** `EXISTS(axis [WHERE expr])`; the inner expression sees each axis node as the candidate */
function parseExists(c: TokenCursor): Expression {
  c.advance();
  c.advance();
  const axisToken = c.expectName('axis');
  const name = axisToken.value.toLowerCase();
  const axis: Axis | null = name === 'self' ? 'self' : axisOf(axisToken);
  if (axis === null) {
    throw c.violation(`Unknown axis '${axisToken.value}' in EXISTS`, axisToken, 'XSQL_P200');
  }
  const where = c.matchAndAdvance('WHERE') ? parseExpression(c) : null;
  c.expect('RPAREN', "')'");
  return { kind: 'exists', axis, where };
}

/** `[axis .] (tag | *) HAS_DIRECT_TEXT ['needle']`, recognised by lookahead */
function tryParseHasDirectText(c: TokenCursor): Expression | null {
  const axis = axisOf(c.current());
  const offset = axis && c.peek(1).type === 'DOT' ? 2 : 0;
  const subject = c.peek(offset);
  if (!(c.isTagToken(subject) || subject.type === 'STAR') || c.peek(offset + 1).type !== 'HAS_DIRECT_TEXT') {
    return null;
  }

  if (offset > 0) {
    c.advance();
    c.advance();
  }
  const tagToken = c.advance();
  c.advance();
  const needle = c.check('STRING') ? c.advance().value : null;
  return {
    kind: 'has_direct_text',
    axis: offset > 0 && axis ? axis : 'self',
    tag: tagToken.type === 'STAR' ? null : tagToken.value.toLowerCase(),
    needle,
  };
}

/** `[qualifier .] [axis .] field_ref` */
export function parseOperand(c: TokenCursor): Operand {
  const position = c.current().position;
  let qualifier: string | null = null;
  let axis: Axis = 'self';
  let word = c.expectName('field reference');

  if (c.check('DOT') && !axisOf(word) && word.value.toLowerCase() !== 'attributes') {
    qualifier = word.value;
    c.advance();
    word = c.expectName('field reference');
  }

  const wordAxis = axisOf(word);
  if (wordAxis && c.check('DOT')) {
    axis = wordAxis;
    c.advance();
    word = c.expectName('field reference');
  }

  return { qualifier, axis, field: parseFieldRef(c, word), position };
}

function parseFieldRef(c: TokenCursor, word: Token): FieldRef {
  const lower = word.value.toLowerCase();
  if (lower === 'attributes') {
    if (c.matchAndAdvance('DOT')) {
      return { kind: 'attribute', name: c.expectName('attribute name').value.toLowerCase() };
    }
    return { kind: 'attributes' };
  }
  if (isIntrinsicField(lower)) {
    return { kind: 'tag_field', field: lower };
  }
  return { kind: 'attribute', name: lower };
}

export function parseLiteral(c: TokenCursor): Literal {
  const token = c.current();
  if (token.type === 'STRING') {
    c.advance();
    return token.value;
  }
  if (token.type === 'NUMBER') {
    c.advance();
    return Number(token.value);
  }
  throw c.error('string or number literal');
}

export function parseLiteralList(c: TokenCursor): Literal[] {
  c.expect('LPAREN', "'('");
  const values: Literal[] = [];
  if (c.matchAndAdvance('RPAREN')) return values;
  do {
    values.push(parseLiteral(c));
  } while (c.matchAndAdvance('COMMA'));
  c.expect('RPAREN', "')'");
  return values;
}
