// =============================================================================
// TRI-PRIME RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (the game session, the robot match script, tests) should import from
// this file rather than from individual modules.
// =============================================================================

// Core types and constants
export * from './types';
export type { Rng } from './rng';
export { coinFlip, createRng, randomInt, randomSeed, shuffleInPlace } from './rng';

// Board
export { Board, generateLayout } from './board/Board';
export type { BoardLayout, BoardOptions, SectorPlacement, SystemPlacement } from './board/Board';
export { Hex, TRI_PRIME_LEVEL } from './board/Hex';
export { Sector } from './board/Sector';
export type { SectorAward } from './board/Sector';
export { Ship } from './board/Ship';
export {
  GRID_COLUMNS,
  gridNeighbors,
  isOnGrid,
  neighborDirection,
  requireNeighborDirection,
  rowsInColumn,
} from './board/hexGeometry';
export { CENTRAL_SECTOR_ID, TRI_PRIME_COORD } from './board/sectorCards';

// Players and strategies
export { Player } from './players/Player';
export type { Strategy, StrategyFactory, StrategyProfile } from './strategy';
export { STRATEGY_PROFILES } from './strategy';

// Decisions
export * from './decisions';

// Commands
export { Command, Expand, Explore, Exterminate, createCommand } from './commands';
export type { CombatResult, CommandContext } from './commands';

// Phase states
export { GameState } from './states/GameState';
export type { StateStep } from './states/GameState';
export { DeployState } from './states/DeployState';
export { PlanState, isValidPlan } from './states/PlanState';
export { PerformState, computeEfficiencies, orderPlayersForSubPhase } from './states/PerformState';
export type { EfficiencyMatrix } from './states/PerformState';
export { ExploitState } from './states/ExploitState';
export { EndRoundState } from './states/EndRoundState';
export { EndGameState, computeResult } from './states/EndGameState';

// Game
export { Game } from './Game';
export type { GameOptions, SubmitResult } from './Game';
export { GameEventBus } from './events';
export type { GameEvent, GameEventOf, GameEventType, GameResult, ScoreLine } from './events';

// Persistence
export { serializeGame, deserializeGame } from './contracts/serialization';
export { GameSnapshotSchema, SNAPSHOT_VERSION } from './contracts/schemas';
export type { GameSnapshot } from './contracts/schemas';

// Errors
export * from './errors';
