/**
 * XSQL Error System
 *
 * Every error the engine raises extends {@link XsqlError} and carries a code
 * (XSQL_L100, XSQL_P200, ...), a suggestion and a context record. Errors found
 * in statement text also carry the offset of the offending token.
 *
 * @example
 * ```typescript
 * import { ParseError, XsqlError, formatCaret, parseQuery } from '@xsql/core';
 *
 * try {
 *   parseQuery(text);
 * } catch (error) {
 *   if (error instanceof ParseError) {
 *     console.error(formatCaret(text, error.offset));
 *   } else if (XsqlError.isCategory(error, 'lex')) {
 *     console.error(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  ExecutionError,
  FilterError,
  LexError,
  OutputError,
  ParseError,
  SourceError,
  XsqlError,
  ensureXsqlError,
  type SerializedXsqlError,
  type XsqlErrorOptions,
} from './xsql-error.js';

export { formatCaret } from './diagnostics.js';
