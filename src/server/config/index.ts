/**
 * Configuration Module - Canonical Entry Point
 *
 * This is the single canonical entry point for all application configuration.
 * All host code should import from this module:
 *
 * Usage:
 *   import { config } from '../config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and validation logic
 * - `index.ts` (this file) - Canonical re-export point
 */

// ============================================================================
// Primary Configuration Export
// ============================================================================

export { config } from './unified';
export type { AppConfig } from './unified';

// ============================================================================
// Environment Schema & Utilities
// ============================================================================

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isTest,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
