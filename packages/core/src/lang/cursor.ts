/**
 * Token cursor shared by the sub-parsers.
 *
 * @module lang/cursor
 */

import type { ErrorCode } from '../errors/index.js';
import { ParseError } from '../errors/index.js';
import { describeToken, TAG_KEYWORDS, type Token, type TokenType } from './tokens.js';

const EOF_TOKEN: Token = { type: 'EOF', value: '', position: 0 };

export class TokenCursor {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  current(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? EOF_TOKEN;
  }

  peek(offset = 1): Token {
    return this.tokens[this.pos + offset] ?? this.tokens[this.tokens.length - 1] ?? EOF_TOKEN;
  }

  advance(): Token {
    const token = this.current();
    if (token.type !== 'EOF') this.pos++;
    return token;
  }

  check(type: TokenType): boolean {
    return this.current().type === type;
  }

  matchAndAdvance(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  expect(type: TokenType, expected: string = type): Token {
    if (!this.check(type)) {
      throw this.error(expected);
    }
    return this.advance();
  }

  /** True when the current token is the identifier `word` (case-insensitive) */
  checkWord(word: string, token: Token = this.current()): boolean {
    return token.type === 'IDENTIFIER' && token.value.toUpperCase() === word;
  }

  matchWord(word: string): boolean {
    if (this.checkWord(word)) {
      this.advance();
      return true;
    }
    return false;
  }

  expectWord(word: string): Token {
    if (!this.checkWord(word)) {
      throw this.error(word);
    }
    return this.advance();
  }

  expectIdentifier(expected = 'identifier'): Token {
    return this.expect('IDENTIFIER', expected);
  }

  /** Tokens that can name an HTML tag: identifiers and a few keywords */
  isTagToken(token: Token = this.current()): boolean {
    return token.type === 'IDENTIFIER' || TAG_KEYWORDS.has(token.type);
  }

  expectTag(): string {
    if (!this.isTagToken()) {
      throw this.error('tag name');
    }
    return this.advance().value.toLowerCase();
  }

  /** Identifiers and keywords: anything usable as a field, attribute or alias name */
  isNameToken(token: Token = this.current()): boolean {
    return token.type !== 'STRING' && /^[A-Za-z_]/.test(token.value);
  }

  expectName(expected = 'name'): Token {
    if (!this.isNameToken()) {
      throw this.error(expected);
    }
    return this.advance();
  }

  expectString(expected = 'string literal'): string {
    return this.expect('STRING', expected).value;
  }

  expectInteger(expected = 'integer'): number {
    const token = this.current();
    if (token.type !== 'NUMBER' || token.value.includes('.')) {
      throw this.error(expected, 'XSQL_P204');
    }
    this.advance();
    return Number.parseInt(token.value, 10);
  }

  /** Build a ParseError positioned at the current token */
  error(expected: string, code: ErrorCode = 'XSQL_P200', message?: string): ParseError {
    const token = this.current();
    const found = describeToken(token);
    return new ParseError(
      message ?? `Expected ${expected} but found ${found} at offset ${token.position}`,
      { offset: token.position, expected, found },
      code
    );
  }

  /** Build a ParseError for a rule violation at `token` */
  violation(message: string, token: Token, code: ErrorCode): ParseError {
    return new ParseError(
      message,
      { offset: token.position, expected: 'valid construct', found: describeToken(token) },
      code
    );
  }
}
