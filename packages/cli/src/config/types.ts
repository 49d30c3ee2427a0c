/**
 * @xsql/cli - Configuration Types
 *
 * Schema of `.xsqlrc.json` project files.
 *
 * @module @xsql/cli/config
 */

import { engineConfigSchema } from '@xsql/core';
import { z } from 'zod';

/** How the CLI prints LIST results */
export const displayModeSchema = z.enum(['list', 'table']);

export const cliConfigSchema = z
  .object({
    /** Document loaded at start-up */
    input: z.string().optional(),
    mode: displayModeSchema.default('list'),
    /** Rows printed in table mode before the rest is elided; null prints all */
    maxDisplayRows: z.number().int().positive().nullable().default(null),
    engine: engineConfigSchema.default({}),
  })
  .strict();

export type DisplayMode = z.infer<typeof displayModeSchema>;

/**
 * XSQL CLI configuration
 *
 * @example
 * ```json
 * {
 *   "mode": "table",
 *   "maxDisplayRows": 40,
 *   "engine": { "maxRows": 10000, "tfidf": { "stopwords": "none" } }
 * }
 * ```
 */
export type CliConfig = z.infer<typeof cliConfigSchema>;
export type CliConfigInput = z.input<typeof cliConfigSchema>;
