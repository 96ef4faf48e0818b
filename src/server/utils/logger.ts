import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Game context stored in AsyncLocalStorage so that every log line written
 * while a session runs carries the session id and, when known, the save name.
 */
export interface GameLogContext {
  sessionId: string;
  saveName?: string;
  seed?: number | null;
}

// ============================================================================
// Game Context (AsyncLocalStorage)
// ============================================================================

export const gameContextStorage = new AsyncLocalStorage<GameLogContext>();

/**
 * Get the current game context from AsyncLocalStorage.
 * Returns undefined if called outside of a session.
 */
export const getGameContext = (): GameLogContext | undefined => {
  return gameContextStorage.getStore();
};

/**
 * Run a function within a game context. All logs and async operations
 * within the callback will have access to the context.
 */
export const runWithGameContext = <T>(context: GameLogContext, fn: () => T): T => {
  return gameContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [/password/i, /secret/i, /token/i, /api[_-]?key/i, /credential/i];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param obj - The object to mask
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && value !== null && value !== undefined) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'tri-prime-engine';
const configuredLogFile = config.logging.file;

if (configuredLogFile) {
  const logDir = path.dirname(path.resolve(configuredLogFile));
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Custom format to add the game context from AsyncLocalStorage to log entries.
 */
const addGameContext = winston.format((info) => {
  const context = getGameContext();
  if (context) {
    info.sessionId = context.sessionId;
    if (context.saveName) {
      info.saveName = context.saveName;
    }
    if (context.seed !== undefined && context.seed !== null) {
      info.seed = context.seed;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  const { level, message, timestamp, ...rest } = info;
  const masked = maskSensitiveData(rest);
  return {
    level,
    message,
    timestamp,
    ...(typeof masked === 'object' && masked !== null ? masked : {}),
  };
});

/**
 * Format for structured JSON logging (used for LOG_FORMAT=json and the file transport).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, sessionId, service, environment, ...meta }) => {
    const sessionStr = typeof sessionId === 'string' ? ` [${sessionId.slice(0, 8)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${sessionStr}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

if (configuredLogFile) {
  logger.add(
    new winston.transports.File({
      filename: path.resolve(configuredLogFile),
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// ============================================================================
// Exports
// ============================================================================

export { logger };
