/**
 * Lexer - turns statement text into tokens.
 *
 * Keywords are matched case-insensitively; everything else alphabetic is an
 * identifier. The first character that cannot start a token raises a
 * {@link LexError}.
 *
 * @module lang/lexer
 */

import { LexError } from '../errors/index.js';
import { isKeyword, type Token, type TokenType } from './tokens.js';

const SINGLE_CHARS: Readonly<Record<string, TokenType>> = {
  '*': 'STAR',
  '(': 'LPAREN',
  ')': 'RPAREN',
  ',': 'COMMA',
  '.': 'DOT',
  ';': 'SEMICOLON',
  '=': 'EQ',
  '~': 'TILDE',
};

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
};

const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';
const isIdentStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
const isIdentPart = (ch: string): boolean => /[A-Za-z0-9_-]/.test(ch);

/**
 * Lexer for XSQL statements
 */
export class Lexer {
  private pos = 0;

  constructor(private readonly input: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.pos >= this.input.length) break;
      tokens.push(this.nextToken());
    }
    tokens.push({ type: 'EOF', value: '', position: this.input.length });
    return tokens;
  }

  private peek(offset = 0): string {
    return this.input.charAt(this.pos + offset);
  }

  private skipTrivia(): void {
    while (this.pos < this.input.length) {
      const ch = this.peek();
      if (/\s/.test(ch)) {
        this.pos++;
      } else if (ch === '-' && this.peek(1) === '-') {
        while (this.pos < this.input.length && this.peek() !== '\n') this.pos++;
      } else {
        return;
      }
    }
  }

  private nextToken(): Token {
    const ch = this.peek();
    const position = this.pos;

    const single = SINGLE_CHARS[ch];
    if (single) {
      this.pos++;
      return { type: single, value: ch, position };
    }

    if ((ch === '<' && this.peek(1) === '>') || (ch === '!' && this.peek(1) === '=')) {
      this.pos += 2;
      return { type: 'NE', value: '<>', position };
    }

    if (ch === "'" || ch === '"') {
      return this.readString(ch);
    }

    if (isDigit(ch)) {
      return this.readNumber();
    }

    if (isIdentStart(ch)) {
      return this.readWord();
    }

    throw new LexError('XSQL_L100', `Unexpected character '${ch}' at offset ${position}`, position, ch);
  }

  private readString(quote: string): Token {
    const position = this.pos;
    this.pos++;
    let value = '';
    while (this.pos < this.input.length) {
      const ch = this.peek();
      if (ch === quote) {
        this.pos++;
        return { type: 'STRING', value, position };
      }
      if (ch === '\\' && this.pos + 1 < this.input.length) {
        const escaped = this.peek(1);
        value += ESCAPES[escaped] ?? escaped;
        this.pos += 2;
        continue;
      }
      value += ch;
      this.pos++;
    }
    throw new LexError(
      'XSQL_L101',
      `Unterminated string literal starting at offset ${position}`,
      position,
      quote
    );
  }

  private readNumber(): Token {
    const position = this.pos;
    while (isDigit(this.peek())) this.pos++;
    if (this.peek() === '.' && isDigit(this.peek(1))) {
      this.pos++;
      while (isDigit(this.peek())) this.pos++;
    }
    return { type: 'NUMBER', value: this.input.slice(position, this.pos), position };
  }

  private readWord(): Token {
    const position = this.pos;
    while (this.pos < this.input.length && isIdentPart(this.peek())) {
      if (this.peek() === '-' && this.peek(1) === '-') break;
      this.pos++;
    }
    const value = this.input.slice(position, this.pos);
    const upper = value.toUpperCase();
    return { type: isKeyword(upper) ? upper : 'IDENTIFIER', value, position };
  }
}

/** Tokenize a statement */
export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
