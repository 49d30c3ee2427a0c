#!/usr/bin/env node
/**
 * @xsql/cli - Command Line Interface
 *
 * The main entry point for the xsql tool.
 *
 * @module @xsql/cli
 */

import { parseArgs, resolveCliOptions, type CliOptions } from './args.js';
import { runQuery } from './commands/query.js';
import { startRepl } from './commands/repl.js';
import { loadConfig, loadProjectConfig, mergeConfig } from './config/loader.js';
import { XsqlSession, formatError } from './session.js';

/**
 * CLI version
 */
const VERSION = '0.1.0';

/**
 * Print main help message
 */
function printHelp(): void {
  console.log(`
xsql - Query HTML documents with SQL-like statements

Usage: xsql [file] [options]

Options:
  --input, -i <file>      HTML document to load as doc
  --query, -q <text>      Run the statements and exit (otherwise start the REPL)
  --mode, -m list|table   Print results as JSON rows or as a table (default: list)
  --max-rows <n>          Stop every query after n rows
  --config, -c <file>     Read settings from this file instead of .xsqlrc.json
  --verbose               Log each execution stage as JSON to stderr
  --help, -h              Show help
  --version, -v           Show version

Examples:
  xsql page.html --query "SELECT a.href FROM doc WHERE attributes.href <> ''"
  xsql page.html -q "SELECT COUNT(li) FROM doc" --mode table
  xsql -q "SELECT * FROM doc TO CSV('nodes.csv')" -i page.html
  xsql page.html                        Open the interactive shell
`);
}

/**
 * Print version
 */
function printVersion(): void {
  console.log(`xsql v${VERSION}`);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = resolveCliOptions(parseArgs(process.argv.slice(2)));
  } catch (error) {
    console.error(formatError(error, ''));
    process.exit(1);
  }

  if (options.help) {
    printHelp();
    process.exit(0);
  }

  if (options.version) {
    printVersion();
    process.exit(0);
  }

  let session: XsqlSession | undefined;
  try {
    const fileConfig = options.config ? await loadConfig(options.config) : await loadProjectConfig();
    const config = mergeConfig(fileConfig, {
      input: options.input,
      mode: options.mode,
      maxRows: options.maxRows,
      verbose: options.verbose,
    });

    session = new XsqlSession({ config });
    if (config.input !== undefined) {
      session.load(config.input);
    }

    if (options.query !== undefined) {
      const code = await runQuery(session, options.query);
      session.destroy();
      process.exit(code);
    }

    await startRepl(session);
    session.destroy();
  } catch (error) {
    session?.destroy();
    console.error(formatError(error, ''));
    process.exit(1);
  }
}

// Run CLI
void main();
