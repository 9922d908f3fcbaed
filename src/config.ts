/**
 * Configuration Module
 *
 * Type-safe configuration read from the environment (and `.env`). Values are
 * validated on first access so a bad setting fails before any input is read.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';
import { keywordScopes } from './deltags/types';
import type { KeywordScope } from './deltags/types';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  HTML_DELTAGS_PARSER: z.string()
    .trim()
    .min(1)
    .default('jsdom')
    .describe('Parser backend used when none is given'),
  HTML_DELTAGS_KW_SCOPE: z.enum(keywordScopes)
    .default('text')
    .describe('Where keyword rules search: text, class or attributes'),

  // Logging Configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose'])
    .default('warn')
    .describe('Logging level'),
  LOG_DIR: z.string()
    .optional()
    .describe('Directory for log files (no log files when unset)'),
  LOG_TO_CONSOLE: z.string()
    .transform(val => val !== 'false')
    .default('true')
    .describe('Whether to log to stderr'),
});

export type EnvConfig = z.infer<typeof envSchema>;

let _config: EnvConfig | null = null;

/**
 * Get the validated configuration.
 * Throws ConfigError on first access if the environment is invalid.
 */
export const getConfig = (): EnvConfig => {
  if (_config) return _config;

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    // The logger is built from this config, so the issues go out on the error
    throw new ConfigError(
      result.error.issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
    );
  }

  _config = result.data;
  return _config;
};

/**
 * Defaults applied to a run when the caller leaves them out
 */
export interface RunDefaults {
  parser: string;
  keywordScope: KeywordScope;
}

export const getRunDefaults = (): RunDefaults => {
  const config = getConfig();
  return {
    parser: config.HTML_DELTAGS_PARSER,
    keywordScope: config.HTML_DELTAGS_KW_SCOPE,
  };
};
