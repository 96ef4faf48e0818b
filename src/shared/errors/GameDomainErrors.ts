/**
 * Game Domain Errors - Structured error types for the host layer
 *
 * This module provides consistent error types for everything around the rules
 * engine: saved games, routing decisions to strategies and the session
 * lifecycle. Rule-level problems live in src/shared/engine/errors.ts.
 *
 * Error Categories:
 * - **Save Errors**: Missing, duplicate, malformed or unreadable saved games
 * - **Decision Errors**: Answers that do not fit the pending request, robots
 *   stuck on rejected answers
 * - **Game Errors**: Operations that need a running game
 *
 * Usage:
 * ```typescript
 * import { SaveNotFoundError, isGameError } from './GameDomainErrors';
 *
 * throw new SaveNotFoundError('evening-game');
 *
 * if (isGameError(error)) {
 *   logger.warn(error.message, { code: error.code, ...error.context });
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all game domain error codes.
 *
 * Error codes are prefixed by category:
 * - SAVE_*: Saved game storage
 * - DECISION_*: Player decision routing
 * - GAME_*: Session lifecycle
 */
export enum GameErrorCode {
  // Save Errors
  SAVE_NOT_FOUND = 'SAVE_NOT_FOUND',
  SAVE_NAME_TAKEN = 'SAVE_NAME_TAKEN',
  SAVE_NAME_INVALID = 'SAVE_NAME_INVALID',
  SAVE_CORRUPT = 'SAVE_CORRUPT',
  SAVE_IO_FAILED = 'SAVE_IO_FAILED',

  // Decision/Choice Errors
  DECISION_NOT_PENDING = 'DECISION_NOT_PENDING',
  DECISION_REJECTED_TOO_OFTEN = 'DECISION_REJECTED_TOO_OFTEN',
  DECISION_CANCELLED = 'DECISION_CANCELLED',

  // Game Errors
  GAME_NOT_STARTED = 'GAME_NOT_STARTED',
  GAME_INVALID_SETUP = 'GAME_INVALID_SETUP',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Process exit codes used by command-line hosts when an error ends the run.
 */
export const ERROR_EXIT_CODES: Record<GameErrorCode, number> = {
  [GameErrorCode.SAVE_NOT_FOUND]: 2,
  [GameErrorCode.SAVE_NAME_TAKEN]: 2,
  [GameErrorCode.SAVE_NAME_INVALID]: 2,
  [GameErrorCode.SAVE_CORRUPT]: 3,
  [GameErrorCode.SAVE_IO_FAILED]: 3,

  [GameErrorCode.DECISION_NOT_PENDING]: 4,
  [GameErrorCode.DECISION_REJECTED_TOO_OFTEN]: 4,
  [GameErrorCode.DECISION_CANCELLED]: 4,

  [GameErrorCode.GAME_NOT_STARTED]: 5,
  [GameErrorCode.GAME_INVALID_SETUP]: 5,

  [GameErrorCode.INTERNAL_ERROR]: 1,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - Exit code mapping
 * - Serialization for logs
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (the session should be aborted) */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODES[this.code] ?? 1;
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a GameError.
 */
export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Storage-level failures for saved games.
 */
export class PersistenceError extends GameError {
  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context, false);
    this.name = 'PersistenceError';
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

export class SaveNotFoundError extends PersistenceError {
  constructor(saveName: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.SAVE_NOT_FOUND, `Saved game not found: ${saveName}`, { saveName, ...context });
    this.name = 'SaveNotFoundError';
    Object.setPrototypeOf(this, SaveNotFoundError.prototype);
  }
}

/**
 * Raised when a save name collides, ignoring case, with an existing save.
 */
export class SaveNameTakenError extends PersistenceError {
  constructor(saveName: string, existing: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.SAVE_NAME_TAKEN, `A saved game named "${existing}" already exists`, {
      saveName,
      existing,
      ...context,
    });
    this.name = 'SaveNameTakenError';
    Object.setPrototypeOf(this, SaveNameTakenError.prototype);
  }
}

export class InvalidSaveNameError extends PersistenceError {
  constructor(saveName: string, reason: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.SAVE_NAME_INVALID, `Invalid save name "${saveName}": ${reason}`, {
      saveName,
      reason,
      ...context,
    });
    this.name = 'InvalidSaveNameError';
    Object.setPrototypeOf(this, InvalidSaveNameError.prototype);
  }
}

export class CorruptSaveError extends PersistenceError {
  constructor(saveName: string, reason: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.SAVE_CORRUPT, `Saved game "${saveName}" cannot be loaded: ${reason}`, {
      saveName,
      reason,
      ...context,
    });
    this.name = 'CorruptSaveError';
    Object.setPrototypeOf(this, CorruptSaveError.prototype);
  }
}

/**
 * Problems routing a decision between a strategy and the engine.
 */
export class DecisionError extends GameError {
  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(code, message, context, isFatal);
    this.name = 'DecisionError';
    Object.setPrototypeOf(this, DecisionError.prototype);
  }
}

/**
 * Raised when a robot keeps answering with decisions the engine rejects.
 */
export class DecisionRejectedTooOftenError extends DecisionError {
  constructor(player: string, attempts: number, lastReason: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.DECISION_REJECTED_TOO_OFTEN,
      `Player ${player} had ${attempts} consecutive decisions rejected (last: ${lastReason})`,
      { player, attempts, lastReason, ...context },
      true
    );
    this.name = 'DecisionRejectedTooOftenError';
    Object.setPrototypeOf(this, DecisionRejectedTooOftenError.prototype);
  }
}

export class GameNotStartedError extends GameError {
  constructor(operation: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_NOT_STARTED, `No game in progress for ${operation}`, {
      operation,
      ...context,
    });
    this.name = 'GameNotStartedError';
    Object.setPrototypeOf(this, GameNotStartedError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

export function isFatalError(error: unknown): boolean {
  return isGameError(error) && error.isFatal;
}

export function getExitCode(error: unknown): number {
  if (isGameError(error)) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
