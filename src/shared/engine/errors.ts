/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Illegal player decisions never throw: they are rejected by the state machine
 * and the same decision is requested again. The errors here are reserved for
 * conditions the engine cannot recover from on its own.
 *
 * Error Categories:
 * - **InvalidState**: Corrupted or unexpected game state (unknown command id,
 *   missing player, scoring a game without players)
 * - **BoardConstraintViolation**: Coordinates outside the grid or hexes that
 *   are not neighbours when a direction is required
 * - **SetupError**: A game that cannot be started with the given roster
 *
 * Relationship to GameDomainErrors:
 * - GameDomainErrors (src/shared/errors/GameDomainErrors.ts) handles host-level
 *   errors (save files, decision routing, session lifecycle)
 * - EngineErrors handles rules-engine-level errors
 *
 * Usage:
 * ```typescript
 * import { InvalidState, EngineErrorCode } from './errors';
 *
 * throw new InvalidState(
 *   EngineErrorCode.STATE_UNKNOWN_COMMAND,
 *   'Unknown command id in plan',
 *   { commandId: 7 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - STATE_*: Game state corruption/inconsistency
 * - BOARD_*: Board geometry/topology issues
 * - SETUP_*: Roster and start-up problems
 */
export enum EngineErrorCode {
  /** Final scoring was requested on a game with an empty roster */
  STATE_NO_PLAYERS = 'STATE_NO_PLAYERS',
  /** A plan referenced a command id outside {1, 2, 3} */
  STATE_UNKNOWN_COMMAND = 'STATE_UNKNOWN_COMMAND',
  /** Expected player not found in the roster */
  STATE_PLAYER_NOT_FOUND = 'STATE_PLAYER_NOT_FOUND',
  /** Expected hex not found on the board */
  STATE_HEX_NOT_FOUND = 'STATE_HEX_NOT_FOUND',
  /** Expected sector not found on the board */
  STATE_SECTOR_NOT_FOUND = 'STATE_SECTOR_NOT_FOUND',
  /** Ships of two different players were placed on the same hex */
  STATE_MIXED_OCCUPANCY = 'STATE_MIXED_OCCUPANCY',
  /** A stored game could not be rebuilt */
  STATE_SNAPSHOT_INVALID = 'STATE_SNAPSHOT_INVALID',

  /** Coordinates outside the 9-column grid */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Two hexes were expected to be adjacent */
  BOARD_NOT_NEIGHBORS = 'BOARD_NOT_NEIGHBORS',

  /** More than three players were added */
  SETUP_TOO_MANY_PLAYERS = 'SETUP_TOO_MANY_PLAYERS',
  /** Player name or strategy was rejected */
  SETUP_INVALID_PLAYER = 'SETUP_INVALID_PLAYER',
  /** The game was started without a full roster, or started twice */
  SETUP_NOT_READY = 'SETUP_NOT_READY',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Corrupted or unexpected game state',
  BOARD_: 'Board geometry/topology constraint violation',
  SETUP_: 'Game setup problem',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Board', 'PerformState') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for corrupted or unexpected game state.
 *
 * This typically indicates either a bug in the engine, a snapshot that was
 * edited by hand, or a host that drove the engine out of order.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for board geometry/topology violations.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for rosters the engine refuses to start with.
 */
export class SetupError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Setup'
  ) {
    super(code, message, context, domain);
    this.name = 'SetupError';
    Object.setPrototypeOf(this, SetupError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Create a standard "not found" InvalidState error.
 *
 * Convenience factory for the common case of expected entities not being found.
 */
export function entityNotFound(
  entityType: 'player' | 'hex' | 'sector',
  context: Record<string, unknown> = {},
  domain: string = 'State'
): InvalidState {
  const codes: Record<typeof entityType, EngineErrorCode> = {
    player: EngineErrorCode.STATE_PLAYER_NOT_FOUND,
    hex: EngineErrorCode.STATE_HEX_NOT_FOUND,
    sector: EngineErrorCode.STATE_SECTOR_NOT_FOUND,
  };

  return new InvalidState(
    codes[entityType],
    `${entityType.charAt(0).toUpperCase() + entityType.slice(1)} not found`,
    context,
    domain
  );
}
