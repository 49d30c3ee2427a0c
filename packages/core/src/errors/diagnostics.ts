/**
 * Caret diagnostics for errors that carry a statement offset.
 *
 * @example
 * ```typescript
 * formatCaret('SELECT a FORM doc', 9);
 * // SELECT a FORM doc
 * //          ^
 * ```
 */
export function formatCaret(statement: string, offset: number): string {
  const clamped = Math.max(0, Math.min(offset, statement.length));
  const lineStart = statement.lastIndexOf('\n', clamped - 1) + 1;
  const lineEnd = statement.indexOf('\n', clamped);
  const line = statement.slice(lineStart, lineEnd === -1 ? statement.length : lineEnd);
  return `${line}\n${' '.repeat(clamped - lineStart)}^`;
}
