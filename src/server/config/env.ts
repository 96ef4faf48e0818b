/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment
 * - Logging
 * - Saved games
 * - Robots
 * - Game
 */
export const EnvSchema = z
  .object({
    // ===================================================================
    // ENVIRONMENT
    // ===================================================================

    /** Application environment mode */
    NODE_ENV: NodeEnvSchema.default('development'),

    /** Application version (injected by npm) */
    npm_package_version: z.string().optional(),

    // ===================================================================
    // LOGGING
    // ===================================================================

    /** Minimum level written by the logger */
    LOG_LEVEL: LogLevelSchema.default('info'),

    /** Console output format */
    LOG_FORMAT: LogFormatSchema.default('pretty'),

    /** Optional JSON log file; no file transport when unset */
    LOG_FILE: z.string().optional(),

    // ===================================================================
    // SAVED GAMES
    // ===================================================================

    /** Directory holding one JSON file per saved game */
    SAVES_DIR: z.string().min(1).default('saves'),

    // ===================================================================
    // ROBOTS
    // ===================================================================

    /** Lower bound of the pause before a robot answers (milliseconds) */
    ROBOT_THINK_MIN_MS: z.coerce.number().int().min(0).default(1800),

    /** Upper bound of the pause before a robot answers (milliseconds) */
    ROBOT_THINK_MAX_MS: z.coerce.number().int().min(0).default(2000),

    // ===================================================================
    // GAME
    // ===================================================================

    /** Fixed board/robot seed for reproducible games */
    GAME_SEED: z.coerce.number().int().min(0).max(0x7fffffff).optional(),

    /** Consecutive rejected robot decisions tolerated before the session aborts */
    MAX_REJECTED_DECISIONS: z.coerce.number().int().positive().default(25),
  })
  .refine((env) => env.ROBOT_THINK_MIN_MS <= env.ROBOT_THINK_MAX_MS, {
    message: 'ROBOT_THINK_MIN_MS must not exceed ROBOT_THINK_MAX_MS',
    path: ['ROBOT_THINK_MIN_MS'],
  });

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validation result with data or errors
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [
            {
              path: '',
              message: result.error.message,
            },
          ];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints the problems and exits the process.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validated environment object
 */
export function loadEnvOrExit(
  env: Record<string, string | undefined> = process.env
): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
