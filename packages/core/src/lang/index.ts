export * from './ast.js';
export { Lexer, tokenize } from './lexer.js';
export { Parser, parseQuery } from './parser.js';
export { KEYWORDS, describeToken, isKeyword, type Keyword, type Token, type TokenType } from './tokens.js';
