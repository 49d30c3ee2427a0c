/**
 * FROM clause sub-parser.
 *
 * @module lang/parse-source
 */

import type { FragmentInput, SelectQuery, Source } from './ast.js';
import type { TokenCursor } from './cursor.js';

const DOCUMENT_NAMES = new Set(['document', 'doc']);

export function isDocumentName(name: string): boolean {
  return DOCUMENT_NAMES.has(name.toLowerCase());
}

/**
 * Parse a source. `parseSubquery` parses the SELECT body nested in
 * `FRAGMENTS(...)`.
 */
export function parseSource(c: TokenCursor, parseSubquery: () => SelectQuery): Source {
  const token = c.current();

  switch (token.type) {
    case 'STRING':
      c.advance();
      return { kind: 'location', location: token.value };

    case 'RAW':
      return { kind: 'raw', markup: parseRawArgument(c) };

    case 'FRAGMENTS': {
      c.advance();
      c.expect('LPAREN', "'('");
      let input: FragmentInput;
      if (c.check('RAW')) {
        input = { kind: 'raw', markup: parseRawArgument(c) };
      } else if (c.check('SELECT')) {
        const subqueryStart = c.current();
        const query = parseSubquery();
        if (query.output) {
          throw c.violation('A FRAGMENTS subquery cannot have a TO clause', subqueryStart, 'XSQL_P202');
        }
        input = { kind: 'query', query };
      } else {
        throw c.error('RAW(...) or SELECT subquery');
      }
      c.expect('RPAREN', "')'");
      return { kind: 'fragments', input, alias: parseAlias(c) };
    }

    case 'IDENTIFIER':
      c.advance();
      if (isDocumentName(token.value)) {
        return { kind: 'document', alias: parseAlias(c) };
      }
      return { kind: 'alias', name: token.value, position: token.position };

    default:
      throw c.error('source (document, doc, a path, RAW(...), FRAGMENTS(...) or an alias)');
  }
}

function parseRawArgument(c: TokenCursor): string {
  c.expect('RAW');
  c.expect('LPAREN', "'('");
  const markup = c.expectString('markup string');
  c.expect('RPAREN', "')'");
  return markup;
}

/** `AS alias` or a bare identifier directly after the source */
function parseAlias(c: TokenCursor): string | null {
  if (c.matchAndAdvance('AS')) {
    return c.expectIdentifier('alias').value;
  }
  if (c.check('IDENTIFIER')) {
    return c.advance().value;
  }
  return null;
}
