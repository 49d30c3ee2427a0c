/**
 * @xsql/cli - Argument parsing
 *
 * @module @xsql/cli/args
 */

import { XsqlError } from '@xsql/core';
import { z } from 'zod';
import { displayModeSchema } from './config/types.js';

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
}

/** Short flags and their long names */
const ALIASES: Record<string, string> = {
  i: 'input',
  q: 'query',
  m: 'mode',
  c: 'config',
  h: 'help',
  v: 'version',
};

/** Flags that never take a value */
const SWITCHES = new Set(['help', 'version', 'verbose']);

/**
 * Parse command line arguments: `--name value`, `--name=value`, `-x value`
 * and bare switches.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg.startsWith('-') && arg !== '-') {
      const body = arg.replace(/^--?/, '');
      const eq = body.indexOf('=');
      const rawKey = eq === -1 ? body : body.slice(0, eq);
      const key = ALIASES[rawKey] ?? rawKey;

      if (eq !== -1) {
        flags[key] = body.slice(eq + 1);
        continue;
      }

      const nextArg = args[i + 1];
      if (!SWITCHES.has(key) && nextArg !== undefined && !nextArg.startsWith('-')) {
        flags[key] = nextArg;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

const cliOptionsSchema = z
  .object({
    input: z.string().optional(),
    query: z.string().optional(),
    mode: displayModeSchema.optional(),
    'max-rows': z.preprocess(
      (value) => (typeof value === 'string' ? Number(value) : value),
      z.number().int().positive().optional()
    ),
    config: z.string().optional(),
    verbose: z.boolean().default(false),
    help: z.boolean().default(false),
    version: z.boolean().default(false),
  })
  .strict();

export interface CliOptions {
  /** Input document; the first positional argument when `--input` is absent */
  readonly input?: string;
  readonly query?: string;
  readonly mode?: z.infer<typeof displayModeSchema>;
  readonly maxRows?: number;
  /** Explicit config file instead of the `.xsqlrc.json` search */
  readonly config?: string;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

/**
 * Validate parsed flags.
 *
 * @throws {XsqlError} XSQL_C700 for an unknown flag or a bad value
 */
export function resolveCliOptions(args: ParsedArgs): CliOptions {
  const parsed = cliOptionsSchema.safeParse(args.flags);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new XsqlError({
      code: 'XSQL_C700',
      message: `Invalid command line: ${issues.join('; ')}`,
      context: { issues },
      suggestion: 'Run "xsql --help" for usage information.',
    });
  }

  const { 'max-rows': maxRows, ...rest } = parsed.data;
  return { ...rest, maxRows, input: rest.input ?? args.positional[0] };
}
