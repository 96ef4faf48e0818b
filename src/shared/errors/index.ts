/**
 * Shared Errors Module
 *
 * This module exports structured error types for consistent error handling
 * in the host layer.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  ERROR_EXIT_CODES,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  PersistenceError,
  SaveNotFoundError,
  SaveNameTakenError,
  InvalidSaveNameError,
  CorruptSaveError,
  DecisionError,
  DecisionRejectedTooOftenError,
  GameNotStartedError,
  // Utilities
  isGameError,
  isFatalError,
  getExitCode,
  wrapError,
} from './GameDomainErrors';
