/**
 * XsqlError - Error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an XsqlError
 */
export interface XsqlErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of an XsqlError
 */
export interface SerializedXsqlError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedXsqlError | { name: string; message: string; stack?: string };
}

/**
 * Base class for every error the engine raises.
 *
 * @example
 * ```typescript
 * try {
 *   parseQuery('SELECT FROM doc');
 * } catch (error) {
 *   if (XsqlError.isCategory(error, 'parse')) {
 *     console.error(error.format());
 *   }
 * }
 * ```
 */
export class XsqlError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: XsqlErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'XsqlError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, XsqlError);
    }
  }

  /**
   * Wrap an existing error with an XsqlError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): XsqlError {
    return new XsqlError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isXsqlError(error: unknown): error is XsqlError {
    return error instanceof XsqlError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return XsqlError.isXsqlError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return XsqlError.isXsqlError(error) && error.category === category;
  }

  /**
   * Format the error for display (basic format)
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedXsqlError {
    const result: SerializedXsqlError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (XsqlError.isXsqlError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Raised by the lexer on the first character it cannot tokenize
 */
export class LexError extends XsqlError {
  /** Offset of the offending character in the statement */
  readonly offset: number;
  readonly char: string;

  constructor(code: ErrorCode, message: string, offset: number, char: string) {
    super({ code, message, context: { offset, char } });
    this.name = 'LexError';
    this.offset = offset;
    this.char = char;
  }
}

/**
 * Raised by the parser on any deviation from the grammar
 */
export class ParseError extends XsqlError {
  readonly offset: number;
  /** Token category the parser wanted */
  readonly expected: string;
  /** Token actually found */
  readonly found: string;

  constructor(
    message: string,
    details: { offset: number; expected: string; found: string },
    code: ErrorCode = 'XSQL_P200'
  ) {
    super({ code, message, context: { ...details } });
    this.name = 'ParseError';
    this.offset = details.offset;
    this.expected = details.expected;
    this.found = details.found;
  }
}

/**
 * Source resolution error (unbound alias, unreadable input, bad fragments)
 */
export class SourceError extends XsqlError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'SourceError';
  }
}

/**
 * Invalid axis/field/operator combination in a WHERE clause
 */
export class FilterError extends XsqlError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'FilterError';
  }
}

/**
 * Fail-fast wrapper naming the pipeline stage that raised `cause`
 */
export class ExecutionError extends XsqlError {
  readonly stage: string;

  constructor(stage: string, cause: Error, code: ErrorCode = 'XSQL_E500') {
    super({
      code,
      message: `Execution failed in ${stage} stage: ${cause.message}`,
      context: { stage },
      cause,
    });
    this.name = 'ExecutionError';
    this.stage = stage;
  }
}

/**
 * File output error (CSV, Parquet or table export)
 */
export class OutputError extends XsqlError {
  readonly path: string;

  constructor(path: string, cause: Error) {
    super({
      code: 'XSQL_O600',
      message: `Could not write ${path}: ${cause.message}`,
      context: { path },
      cause,
    });
    this.name = 'OutputError';
    this.path = path;
  }
}

/**
 * Helper function to ensure errors are XsqlErrors
 */
export function ensureXsqlError(error: unknown, defaultCode: ErrorCode = 'XSQL_X900'): XsqlError {
  if (XsqlError.isXsqlError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return XsqlError.wrap(error, defaultCode);
  }

  return new XsqlError({
    code: defaultCode,
    message: String(error),
  });
}
