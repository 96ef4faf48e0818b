/**
 * Core value types and rule constants shared by every engine module.
 */

export type PlayerColor = 'BLUE' | 'GREEN' | 'RED';

/** Colours are handed out in this order as players join. */
export const PLAYER_COLORS: readonly PlayerColor[] = ['BLUE', 'GREEN', 'RED'];

export const COMMAND_IDS = {
  EXPAND: 1,
  EXPLORE: 2,
  EXTERMINATE: 3,
} as const;

export type CommandId = (typeof COMMAND_IDS)[keyof typeof COMMAND_IDS];

export type CommandName = 'expand' | 'explore' | 'exterminate';

export const COMMAND_NAMES: Record<CommandId, CommandName> = {
  1: 'expand',
  2: 'explore',
  3: 'exterminate',
};

export const ALL_COMMAND_IDS: readonly CommandId[] = [
  COMMAND_IDS.EXPAND,
  COMMAND_IDS.EXPLORE,
  COMMAND_IDS.EXTERMINATE,
];

export function isCommandId(value: number): value is CommandId {
  return value === 1 || value === 2 || value === 3;
}

export type GamePhase = 'deploy' | 'plan' | 'perform' | 'exploit' | 'end_round' | 'end_game';

export interface HexCoord {
  x: number;
  y: number;
}

export function coordKey(coord: HexCoord): string {
  return `${coord.x},${coord.y}`;
}

// -----------------------------------------------------------------------------
// Rule constants
// -----------------------------------------------------------------------------

export const MAX_PLAYERS = 3;
export const SHIPS_PER_PLAYER = 15;
export const MAX_TURNS = 9;
export const PERFORM_SUB_PHASES = 3;
export const SHIPS_PER_DEPLOYMENT = 2;
export const PLAYER_NAME_MAX_LENGTH = 7;

/** Expand adds, Explore moves and Exterminate invades at most `BASE - efficiency` times. */
export const COMMAND_BASE_ALLOWANCE = 4;

/** An Explore fleet moves at most this many hexes away from its start. */
export const EXPLORE_MAX_RANGE = 2;

export function allowanceForEfficiency(efficiency: number): number {
  return COMMAND_BASE_ALLOWANCE - efficiency;
}
