/**
 * @xsql/cli - Interactive REPL
 *
 * Lines accumulate until a `;` ends a statement. Lines starting with `.` at
 * the start of a statement are REPL commands.
 *
 * @module @xsql/cli/commands
 */

import * as readline from 'node:readline';
import { displayModeSchema } from '../config/types.js';
import { consoleOutput, formatError, type Output, type XsqlSession } from '../session.js';
import { splitStatements } from '../statements.js';

const PROMPT = 'xsql> ';
const CONTINUATION_PROMPT = '   -> ';

const HELP = `Commands:
  .help                          Show this help
  .load <path> [--alias <name>]  Load an HTML file as the document (or under an alias)
  .mode list|table               Print results as JSON rows or as a table
  .max_rows <n|inf>              Rows shown in table mode
  .quit, .q                      Exit

Statements end with ';'.
  SELECT ... FROM doc [WHERE ...] [ORDER BY ...] [LIMIT n] [TO LIST()|TABLE()|CSV('f')|PARQUET('f')]
  SHOW INPUT(S) / SHOW FUNCTIONS / SHOW AXES / SHOW OPERATORS
  DESCRIBE DOC / DESCRIBE LANGUAGE`;

/** Split a command line on whitespace, honouring single and double quotes */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: string | null = null;
  let pending = false;

  for (const ch of line) {
    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      pending = true;
    } else if (/\s/.test(ch)) {
      if (pending) args.push(current);
      current = '';
      pending = false;
    } else {
      current += ch;
      pending = true;
    }
  }

  if (quote !== null) {
    throw new Error('Unterminated quote');
  }
  if (pending) args.push(current);
  return args;
}

export class Repl {
  private buffer = '';

  constructor(
    private readonly session: XsqlSession,
    private readonly output: Output = consoleOutput
  ) {}

  get prompt(): string {
    return this.buffer === '' ? PROMPT : CONTINUATION_PROMPT;
  }

  /**
   * Feed one input line.
   *
   * @returns false once the user asked to quit
   */
  async handleLine(line: string): Promise<boolean> {
    if (this.buffer === '' && line.trim().startsWith('.')) {
      return this.handleCommand(line.trim());
    }

    this.buffer = this.buffer === '' ? line : `${this.buffer}\n${line}`;
    const { statements, rest } = splitStatements(this.buffer);
    this.buffer = rest.trim() === '' ? '' : rest;

    for (const statement of statements) {
      await this.session.run(statement);
    }
    return true;
  }

  private handleCommand(line: string): boolean {
    let args: string[];
    try {
      args = splitArgs(line.replace(/;+$/, ''));
    } catch (error) {
      this.output.err(`Error: ${error instanceof Error ? error.message : String(error)} in ${line}`);
      return true;
    }
    const [command = '', ...rest] = args;

    switch (command) {
      case '.quit':
      case '.q':
        return false;

      case '.help':
        this.output.out(HELP);
        return true;

      case '.load':
        this.load(rest);
        return true;

      case '.mode': {
        const mode = displayModeSchema.safeParse(rest[0]);
        if (mode.success) {
          this.session.mode = mode.data;
          this.output.out(`Output mode: ${mode.data}`);
        } else {
          this.output.err('Usage: .mode list|table');
        }
        return true;
      }

      case '.max_rows':
        this.setMaxRows(rest[0]);
        return true;

      default:
        this.output.err(`Unknown command: ${command}. Type .help for the list of commands.`);
        return true;
    }
  }

  private load(args: readonly string[]): void {
    let file: string | undefined;
    let alias: string | undefined;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? '';
      if (arg === '--alias') {
        alias = args[++i];
        if (alias === undefined) {
          this.output.err('Error: missing value for --alias');
          return;
        }
      } else if (arg.startsWith('-')) {
        this.output.err(`Error: unknown option ${arg}`);
        return;
      } else if (file === undefined) {
        file = arg;
      } else {
        this.output.err('Error: .load takes a single path');
        return;
      }
    }

    if (file === undefined) {
      this.output.err('Usage: .load <path> [--alias <name>]');
      return;
    }

    try {
      const tree = this.session.load(file, alias);
      this.output.out(`Loaded ${file} as ${alias ?? 'doc'} (${tree.nodes.length} nodes)`);
    } catch (error) {
      this.output.err(formatError(error, ''));
    }
  }

  private setMaxRows(value: string | undefined): void {
    if (value === 'inf' || value === 'unlimited') {
      this.session.maxDisplayRows = null;
      this.output.out('Max rows: unlimited');
      return;
    }

    const parsed = value !== undefined && /^\d+$/.test(value) ? Number(value) : NaN;
    if (!Number.isInteger(parsed) || parsed <= 0) {
      this.output.err('Usage: .max_rows <n|inf>');
      return;
    }
    this.session.maxDisplayRows = parsed;
    this.output.out(`Max rows: ${parsed}`);
  }
}

/**
 * Read statements from stdin until `.quit` or end of input.
 */
export async function startRepl(session: XsqlSession, output: Output = consoleOutput): Promise<void> {
  const repl = new Repl(session, output);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY,
  });

  output.out('XSQL interactive shell. Type .help for commands, .quit to exit.');
  rl.setPrompt(repl.prompt);
  rl.prompt();

  try {
    for await (const line of rl) {
      if (!(await repl.handleLine(line))) break;
      rl.setPrompt(repl.prompt);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
