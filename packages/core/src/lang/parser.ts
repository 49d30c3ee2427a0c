/**
 * XSQL Parser - recursive descent over the token stream.
 *
 * Supports: SELECT ... [EXCLUDE ...] FROM ... [WHERE ...] [ORDER BY ...]
 * [LIMIT n] [TO ...], SHOW and DESCRIBE. A statement either parses completely
 * or raises a ParseError; no partial tree is returned.
 *
 * @module lang/parser
 */

import type {
  DescribeQuery,
  OrderItem,
  OutputClause,
  SelectQuery,
  ShowQuery,
  ShowTarget,
  Statement,
} from './ast.js';
import { TokenCursor } from './cursor.js';
import { Lexer } from './lexer.js';
import { parseExpression } from './parse-expression.js';
import { parseExcludeList, parseSelectList } from './parse-select.js';
import { parseSource } from './parse-source.js';
import { describeToken } from './tokens.js';

const SHOW_TARGETS: Readonly<Record<string, ShowTarget>> = {
  INPUT: 'input',
  INPUTS: 'inputs',
  FUNCTIONS: 'functions',
  AXES: 'axes',
  OPERATORS: 'operators',
};

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Recursive descent parser for XSQL
 */
export class Parser {
  parse(input: string): Statement {
    const c = new TokenCursor(new Lexer(input).tokenize());
    const statement = this.parseStatement(c);

    c.matchAndAdvance('SEMICOLON');
    if (!c.check('EOF')) {
      const token = c.current();
      throw c.error(
        'end of statement',
        'XSQL_P200',
        `Unexpected ${describeToken(token)} after statement at offset ${token.position}`
      );
    }
    return deepFreeze(statement);
  }

  private parseStatement(c: TokenCursor): Statement {
    switch (c.current().type) {
      case 'SELECT':
        return this.parseSelect(c);
      case 'SHOW':
        return this.parseShow(c);
      case 'DESCRIBE':
        return this.parseDescribe(c);
      default:
        throw c.error('SELECT, SHOW or DESCRIBE');
    }
  }

  private parseSelect(c: TokenCursor): SelectQuery {
    c.expect('SELECT');
    const items = parseSelectList(c);

    const excludeToken = c.current();
    const exclude = c.matchAndAdvance('EXCLUDE') ? parseExcludeList(c) : [];
    if (exclude.length > 0) {
      const onlyStar = items.length === 1 && items[0]?.kind === 'node' && items[0].tag === null;
      if (!onlyStar) {
        throw c.violation('EXCLUDE requires SELECT *', excludeToken, 'XSQL_P202');
      }
    }

    c.expect('FROM', 'FROM');
    const source = parseSource(c, () => this.parseSelect(c));
    const where = c.matchAndAdvance('WHERE') ? parseExpression(c) : null;

    const orderToken = c.current();
    const orderBy = this.parseOrderBy(c);
    if (orderBy.length > 0 && items.every((item) => item.kind === 'count')) {
      throw c.violation('ORDER BY is not allowed when every select item is COUNT', orderToken, 'XSQL_P202');
    }

    const limit = c.matchAndAdvance('LIMIT') ? c.expectInteger('non-negative integer') : null;
    const output = c.matchAndAdvance('TO') ? this.parseOutput(c) : null;

    return { kind: 'select', items, exclude, source, where, orderBy, limit, output };
  }

  private parseOrderBy(c: TokenCursor): OrderItem[] {
    if (!c.matchAndAdvance('ORDER')) return [];
    c.expect('BY', 'BY');

    const items: OrderItem[] = [];
    do {
      const start = c.current();
      let key = c.expectName('ORDER BY key').value;
      if (c.matchAndAdvance('LPAREN')) {
        const arg = c.check('STAR') ? c.advance().value : c.expectName('argument').value.toLowerCase();
        c.expect('RPAREN', "')'");
        key = `${key.toUpperCase()}(${arg})`;
      } else {
        while (c.matchAndAdvance('DOT')) {
          key = `${key}.${c.expectName('field name').value}`;
        }
      }

      let direction: OrderItem['direction'] = 'asc';
      if (c.matchAndAdvance('DESC')) {
        direction = 'desc';
      } else {
        c.matchAndAdvance('ASC');
      }
      items.push({ key, direction, position: start.position });
    } while (c.matchAndAdvance('COMMA'));
    return items;
  }

  private parseOutput(c: TokenCursor): OutputClause {
    const token = c.current();
    switch (token.type) {
      case 'LIST':
        c.advance();
        c.expect('LPAREN', "'('");
        c.expect('RPAREN', "')'");
        return { kind: 'list' };

      case 'TABLE':
        c.advance();
        return this.parseTableOptions(c);

      case 'CSV':
      case 'PARQUET': {
        c.advance();
        c.expect('LPAREN', "'('");
        const path = c.expectString('output path string');
        c.expect('RPAREN', "')'");
        return token.type === 'CSV' ? { kind: 'csv', path } : { kind: 'parquet', path };
      }

      default:
        throw c.error('LIST(), TABLE(...), CSV(path) or PARQUET(path)');
    }
  }

  private parseTableOptions(c: TokenCursor): OutputClause {
    c.expect('LPAREN', "'('");
    let header = true;
    let exportPath: string | null = null;

    if (!c.check('RPAREN')) {
      do {
        if (c.matchWord('HEADER')) {
          c.matchAndAdvance('EQ');
          const value = c.expectName('ON or OFF');
          const upper = value.value.toUpperCase();
          if (upper !== 'ON' && upper !== 'OFF') {
            throw c.violation(`HEADER must be ON or OFF, not '${value.value}'`, value, 'XSQL_P200');
          }
          header = upper === 'ON';
        } else if (c.matchWord('NOHEADER') || c.matchWord('NO_HEADER')) {
          header = false;
        } else if (c.matchWord('EXPORT')) {
          c.matchAndAdvance('EQ');
          exportPath = c.expectString('export path string');
        } else {
          throw c.error('HEADER, NOHEADER or EXPORT');
        }
      } while (c.matchAndAdvance('COMMA'));
    }

    c.expect('RPAREN', "')'");
    return { kind: 'table', header, exportPath };
  }

  private parseShow(c: TokenCursor): ShowQuery {
    c.expect('SHOW');
    const token = c.current();
    const target = token.type === 'IDENTIFIER' ? SHOW_TARGETS[token.value.toUpperCase()] : undefined;
    if (!target) {
      throw c.error('INPUT, INPUTS, FUNCTIONS, AXES or OPERATORS');
    }
    c.advance();
    return { kind: 'show', target };
  }

  private parseDescribe(c: TokenCursor): DescribeQuery {
    c.expect('DESCRIBE');
    if (c.matchWord('DOC') || c.matchWord('DOCUMENT')) {
      return { kind: 'describe', target: 'document' };
    }
    if (c.matchWord('LANGUAGE')) {
      return { kind: 'describe', target: 'language' };
    }
    throw c.error('DOC, DOCUMENT or LANGUAGE');
  }
}

/**
 * Parse one XSQL statement into a frozen AST.
 *
 * @throws {LexError} on the first character that cannot be tokenized
 * @throws {ParseError} on any deviation from the grammar
 */
export function parseQuery(text: string): Statement {
  return new Parser().parse(text);
}
