/**
 * @xsql/cli - Query Command
 *
 * Runs the statements given with `--query` once and exits.
 *
 * @module @xsql/cli/commands
 */

import type { XsqlSession } from '../session.js';
import { isBlank, splitStatements } from '../statements.js';

/**
 * Run every statement in `text`. The last statement may omit its `;`.
 *
 * @returns Process exit code: 0 when every statement succeeded
 */
export async function runQuery(session: XsqlSession, text: string): Promise<number> {
  const { statements, rest } = splitStatements(text);
  const all = isBlank(rest) ? statements : [...statements, rest.trim()];
  return (await session.runAll(all)) ? 0 : 1;
}
