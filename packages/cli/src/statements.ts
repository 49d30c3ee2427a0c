/**
 * @xsql/cli - Statement splitting
 *
 * @module @xsql/cli/statements
 */

export interface SplitStatements {
  /** Statements terminated by `;`, without the terminator */
  readonly statements: string[];
  /** Text after the last terminator */
  readonly rest: string;
}

/**
 * Split input on `;`, ignoring semicolons inside string literals and `--`
 * comments. Statements holding only whitespace and comments are dropped.
 *
 * @example
 * ```typescript
 * splitStatements("SELECT a FROM doc; SHOW INPUT; SELECT 'x;");
 * // { statements: ['SELECT a FROM doc', 'SHOW INPUT'], rest: " SELECT 'x;" }
 * ```
 */
export function splitStatements(text: string): SplitStatements {
  const statements: string[] = [];
  let start = 0;
  let quote: string | null = null;
  let comment = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (comment) {
      if (ch === '\n') comment = false;
    } else if (quote !== null) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '-' && text.charAt(i + 1) === '-') {
      comment = true;
    } else if (ch === ';') {
      const statement = text.slice(start, i).trim();
      if (!isBlank(statement)) statements.push(statement);
      start = i + 1;
    }
  }

  return { statements, rest: text.slice(start) };
}

/** True when `text` holds nothing but whitespace and comments */
export function isBlank(text: string): boolean {
  return text.replace(/--[^\n]*/g, '').trim() === '';
}
