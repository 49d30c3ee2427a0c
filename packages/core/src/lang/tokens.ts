/**
 * Token definitions shared by the lexer and the parser.
 *
 * @module lang/tokens
 */

export const KEYWORDS = [
  'SELECT',
  'FROM',
  'WHERE',
  'AND',
  'OR',
  'IN',
  'LIMIT',
  'EXCLUDE',
  'ORDER',
  'BY',
  'ASC',
  'DESC',
  'AS',
  'TO',
  'LIST',
  'TABLE',
  'CSV',
  'PARQUET',
  'RAW',
  'FRAGMENTS',
  'CONTAINS',
  'ALL',
  'ANY',
  'IS',
  'NOT',
  'NULL',
  'HAS_DIRECT_TEXT',
  'SHOW',
  'DESCRIBE',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

export type TokenType =
  | Keyword
  | 'IDENTIFIER'
  | 'STRING'
  | 'NUMBER'
  | 'STAR'
  | 'LPAREN'
  | 'RPAREN'
  | 'COMMA'
  | 'DOT'
  | 'SEMICOLON'
  | 'EQ'
  | 'NE'
  | 'TILDE'
  | 'EOF';

export interface Token {
  readonly type: TokenType;
  /** Source text for keywords, identifiers and punctuation; decoded text for strings */
  readonly value: string;
  /** Zero-based offset in the statement */
  readonly position: number;
}

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);

export function isKeyword(word: string): word is Keyword {
  return KEYWORD_SET.has(word);
}

/** Keywords that double as HTML tag names in tag positions */
export const TAG_KEYWORDS: ReadonlySet<TokenType> = new Set<TokenType>(['TABLE', 'SELECT']);

/** Human-readable description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'EOF':
      return 'end of input';
    case 'STRING':
      return `string '${token.value}'`;
    case 'NUMBER':
      return `number ${token.value}`;
    case 'IDENTIFIER':
      return `identifier '${token.value}'`;
    default:
      return `'${token.value}'`;
  }
}
