/**
 * Engine configuration, validated with zod.
 *
 * @module config
 */

import { z } from 'zod';
import { XsqlError } from './errors/index.js';

export const stopwordSetSchema = z.enum(['english', 'none']);

export const tfidfDefaultsSchema = z
  .object({
    topTerms: z.number().int().positive().default(30),
    minDf: z.number().int().nonnegative().default(1),
    /** 0 means "the corpus size" */
    maxDf: z.number().int().nonnegative().default(0),
    stopwords: stopwordSetSchema.default('english'),
  })
  .strict();

export const loggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    json: z.boolean().default(false),
  })
  .strict();

export const engineConfigSchema = z
  .object({
    /** Hard cap on result rows, applied after LIMIT */
    maxRows: z.number().int().positive().nullable().default(null),
    /** Character budget for SUMMARIZE(*) digests */
    summaryLength: z.number().int().positive().default(120),
    tfidf: tfidfDefaultsSchema.default({}),
    logger: loggerConfigSchema.default({}),
  })
  .strict();

export type StopwordSet = z.infer<typeof stopwordSetSchema>;
export type TfidfDefaults = z.infer<typeof tfidfDefaultsSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate and default an engine configuration.
 *
 * @throws {XsqlError} XSQL_C700 listing every invalid field
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new XsqlError({
      code: 'XSQL_C700',
      message: `Invalid engine configuration: ${issues.join('; ')}`,
      context: { issues },
    });
  }
  return parsed.data;
}
