/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object for all server code.
 *
 * Usage:
 *   import { config } from './config';
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../../shared/errors';
import {
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  MAX_TIMER_DELAY_MS,
  parseEnv,
  getEffectiveNodeEnv,
  type RawEnv,
} from './env';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  sessions: z.object({
    maxSessions: z.number().int().positive(),
  }),
  timers: z.object({
    maxDelayMs: z.number().int().min(1).max(MAX_TIMER_DELAY_MS),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Build a validated, frozen config from an environment object. Exported so
 * tests can exercise configuration without touching process.env.
 */
export function buildConfig(
  rawEnv: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success || !envResult.data) {
    throw new ConfigurationError(envResult.errors ?? []);
  }

  const env: RawEnv = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(env);

  return Object.freeze(
    ConfigSchema.parse({
      nodeEnv,
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      logging: {
        level: env.LOG_LEVEL,
        format: env.LOG_FORMAT,
        file: env.LOG_FILE?.trim() || undefined,
      },
      sessions: {
        maxSessions: env.MAX_SESSIONS,
      },
      timers: {
        maxDelayMs: env.TIMER_MAX_DELAY_MS,
      },
    })
  );
}

// Load .env into process.env before we read anything from it. Skipped in
// test mode so a developer's .env cannot override test-specific settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export const config: Readonly<AppConfig> = buildConfig();
