/**
 * XSQL Error Codes
 *
 * Error codes are structured as XSQL_[CATEGORY][NUMBER]:
 * - L: Lexical errors (L100-L199)
 * - P: Parse errors (P200-P299)
 * - S: Source errors (S300-S399)
 * - F: Filter errors (F400-F499)
 * - E: Execution errors (E500-E599)
 * - O: Output errors (O600-O699)
 * - C: Configuration errors (C700-C799)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Lexical errors (L100-L199)
  XSQL_L100: {
    code: 'XSQL_L100',
    message: 'Unexpected character',
    suggestion: 'Remove the character or quote it inside a string literal.',
  },
  XSQL_L101: {
    code: 'XSQL_L101',
    message: 'Unterminated string literal',
    suggestion: 'Close the string with the same quote it was opened with.',
  },

  // Parse errors (P200-P299)
  XSQL_P200: {
    code: 'XSQL_P200',
    message: 'Unexpected token',
    suggestion: 'Check the statement against DESCRIBE LANGUAGE.',
  },
  XSQL_P201: {
    code: 'XSQL_P201',
    message: 'Invalid select list',
    suggestion: 'Select either tags (or *) or projections and functions, not both.',
  },
  XSQL_P202: {
    code: 'XSQL_P202',
    message: 'Invalid clause combination',
    suggestion: 'Some clauses only apply to certain select lists; see DESCRIBE LANGUAGE.',
  },
  XSQL_P203: {
    code: 'XSQL_P203',
    message: 'Invalid TFIDF argument',
    suggestion: 'Use TFIDF(tag[, ...][, TOP_TERMS=n][, MIN_DF=n][, MAX_DF=n][, STOPWORDS=ENGLISH|NONE]).',
  },
  XSQL_P204: {
    code: 'XSQL_P204',
    message: 'Invalid literal',
    suggestion: 'Use a non-negative integer.',
  },
  XSQL_P205: {
    code: 'XSQL_P205',
    message: 'Duplicate column name',
    suggestion: 'Give one of the select items a distinct name with AS.',
  },

  // Source errors (S300-S399)
  XSQL_S300: {
    code: 'XSQL_S300',
    message: 'Unknown source alias',
    suggestion: 'Bind the alias with FROM document AS <alias> or register it on the engine.',
  },
  XSQL_S301: {
    code: 'XSQL_S301',
    message: 'Source could not be loaded',
    suggestion: 'Check that the path exists and is readable.',
  },
  XSQL_S302: {
    code: 'XSQL_S302',
    message: 'Invalid fragment input',
    suggestion: 'A FRAGMENTS subquery must return a single column of HTML strings.',
  },
  XSQL_S303: {
    code: 'XSQL_S303',
    message: 'Network sources are not supported',
    suggestion: 'Download the document first and query the local file.',
  },

  // Filter errors (F400-F499)
  XSQL_F400: {
    code: 'XSQL_F400',
    message: 'Operator does not apply to this field',
    suggestion: 'Numeric fields accept =, <>, IN and IS [NOT] NULL with numeric values.',
  },
  XSQL_F401: {
    code: 'XSQL_F401',
    message: 'Invalid regular expression',
    suggestion: 'Check the pattern syntax; patterns use ECMAScript regular expressions.',
  },
  XSQL_F402: {
    code: 'XSQL_F402',
    message: 'Unknown qualifier',
    suggestion: 'Qualify fields with the source alias, doc or document.',
  },
  XSQL_F403: {
    code: 'XSQL_F403',
    message: 'Unsupported descendant filter',
    suggestion:
      'With FLATTEN_TEXT, descendant filters take tag (=, IN) or attributes.x (=, IN, CONTAINS) and no OR.',
  },

  // Execution errors (E500-E599)
  XSQL_E500: {
    code: 'XSQL_E500',
    message: 'Statement execution failed',
    suggestion: 'See the cause for the failing stage.',
  },
  XSQL_E501: {
    code: 'XSQL_E501',
    message: 'Statement aborted',
    suggestion: 'The host cancelled the statement between stages.',
  },
  XSQL_E502: {
    code: 'XSQL_E502',
    message: 'Unknown ORDER BY key',
    suggestion: 'Order by a selected column, its alias, or a node field.',
  },
  XSQL_E503: {
    code: 'XSQL_E503',
    message: 'Table extraction requires a single table',
    suggestion: 'Add a WHERE clause that selects exactly one table.',
  },

  // Output errors (O600-O699)
  XSQL_O600: {
    code: 'XSQL_O600',
    message: 'Output could not be written',
    suggestion: 'Check that the target directory exists and is writable.',
  },

  // Configuration errors (C700-C799)
  XSQL_C700: {
    code: 'XSQL_C700',
    message: 'Invalid configuration',
    suggestion: 'Check the configuration values against the documented options.',
  },

  // Internal errors (X900-X999)
  XSQL_X900: {
    code: 'XSQL_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'lex'
  | 'parse'
  | 'source'
  | 'filter'
  | 'execution'
  | 'output'
  | 'config'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(5);
  switch (letter) {
    case 'L':
      return 'lex';
    case 'P':
      return 'parse';
    case 'S':
      return 'source';
    case 'F':
      return 'filter';
    case 'E':
      return 'execution';
    case 'O':
      return 'output';
    case 'C':
      return 'config';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
