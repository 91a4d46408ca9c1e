/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables read by
 * the session host. `unified.ts` assembles them into the typed config.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Largest delay accepted by Node's setTimeout; longer delays overflow and
 * fire immediately.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  /** `json` for structured output, `pretty` for local development */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Optional log file; console only when unset */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // SESSIONS
  // ===================================================================

  /** Maximum number of live sessions per session manager */
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),

  /** Longest single timer delay; longer waits are re-armed in chunks */
  TIMER_MAX_DELAY_MS: z.coerce.number().int().min(1).max(MAX_TIMER_DELAY_MS).default(MAX_TIMER_DELAY_MS),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Under Jest the effective environment is always `test`, whatever NODE_ENV
 * says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
