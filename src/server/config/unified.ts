/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for all application configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 *
 * Usage:
 *   import { config } from '../config';
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { isTestEnvironment } from '../../shared/utils/envFlags';
import { NodeEnvSchema, LogFormatSchema, LogLevelSchema, loadEnvOrExit, getEffectiveNodeEnv, isTest } from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot override test settings.
if (!isTestEnvironment()) {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);

// Under Jest the effective environment is always "test", which also turns
// robot thinking pauses off so sessions finish immediately.
const nodeEnv = getEffectiveNodeEnv(env);
const skipThinking = isTest(nodeEnv);

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  app: z.object({
    version: z.string(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  saves: z.object({
    directory: z.string().min(1),
    extension: z.literal('.json'),
  }),
  robots: z
    .object({
      thinkingDelayMinMs: z.number().int().min(0),
      thinkingDelayMaxMs: z.number().int().min(0),
    })
    .refine((robots) => robots.thinkingDelayMinMs <= robots.thinkingDelayMaxMs, {
      message: 'thinkingDelayMinMs must not exceed thinkingDelayMaxMs',
    }),
  game: z.object({
    seed: z.number().int().optional(),
    maxRejectedDecisions: z.number().int().positive(),
  }),
});

const preliminaryConfig = {
  nodeEnv,
  app: {
    version: env.npm_package_version ?? '0.0.0',
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  saves: {
    directory: env.SAVES_DIR,
    extension: '.json',
  },
  robots: {
    thinkingDelayMinMs: skipThinking ? 0 : env.ROBOT_THINK_MIN_MS,
    thinkingDelayMaxMs: skipThinking ? 0 : env.ROBOT_THINK_MAX_MS,
  },
  game: {
    seed: env.GAME_SEED,
    maxRejectedDecisions: env.MAX_REJECTED_DECISIONS,
  },
};

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
