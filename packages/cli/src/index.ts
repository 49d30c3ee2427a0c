/**
 * @xsql/cli - Programmatic API
 *
 * The pieces behind the `xsql` command: argument and config handling, the
 * session that runs statements and the interactive shell.
 *
 * @example Running statements programmatically
 * ```typescript
 * import { XsqlSession, loadProjectConfig, runQuery } from '@xsql/cli';
 *
 * const session = new XsqlSession({ config: await loadProjectConfig() });
 * session.load('page.html');
 * await runQuery(session, "SELECT a.href FROM doc WHERE attributes.href <> '';");
 * session.destroy();
 * ```
 *
 * @module @xsql/cli
 */

export { parseArgs, resolveCliOptions, type CliOptions, type ParsedArgs } from './args.js';
export { runQuery } from './commands/query.js';
export { Repl, splitArgs, startRepl } from './commands/repl.js';
export {
  CONFIG_FILE,
  findConfigFile,
  loadConfig,
  loadProjectConfig,
  mergeConfig,
  parseConfig,
  type ConfigOverrides,
} from './config/loader.js';
export {
  cliConfigSchema,
  displayModeSchema,
  type CliConfig,
  type CliConfigInput,
  type DisplayMode,
} from './config/types.js';
export { XsqlSession, consoleOutput, formatError, type Output, type SessionOptions } from './session.js';
export { isBlank, splitStatements, type SplitStatements } from './statements.js';
