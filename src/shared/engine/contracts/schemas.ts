/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Snapshot Schemas
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Shape of a stored game. A snapshot captures everything needed to resume at
 * the exact pending decision: the board layout, every ship's flags and hex,
 * each player's plan and score, and the progress of the current phase
 * (including an Explore fleet in transit or an invasion in progress).
 *
 * Ships are referenced by owner colour and fleet index.
 */

import { z } from 'zod';

export const SNAPSHOT_VERSION = 1;

// ═══════════════════════════════════════════════════════════════════════════
// Building blocks
// ═══════════════════════════════════════════════════════════════════════════

export const PlayerColorSchema = z.enum(['BLUE', 'GREEN', 'RED']);

export const CommandIdSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const HexCoordSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
});

export const ShipRefSchema = z.object({
  owner: PlayerColorSchema,
  index: z.number().int().min(0).max(14),
});

export type ShipRef = z.infer<typeof ShipRefSchema>;

export const BoardLayoutSchema = z.object({
  sectors: z
    .array(
      z.object({
        id: z.number().int().min(0).max(8),
        systems: z.array(HexCoordSchema.extend({ level: z.number().int().min(1).max(2) })).length(3),
      })
    )
    .length(8),
});

// ═══════════════════════════════════════════════════════════════════════════
// Commands in progress
// ═══════════════════════════════════════════════════════════════════════════

const CommandSnapshotBase = z.object({
  player: PlayerColorSchema,
  efficiency: z.number().int().min(1).max(3),
  finished: z.boolean(),
});

export const ExpandSnapshotSchema = CommandSnapshotBase.extend({
  type: z.literal('expand'),
  shipsAllowed: z.number().int().min(0),
  shipsAdded: z.number().int().min(0),
});

export const ExploreSnapshotSchema = CommandSnapshotBase.extend({
  type: z.literal('explore'),
  movementsAllowed: z.number().int().min(0),
  movementsMade: z.number().int().min(0),
  path: z.array(HexCoordSchema),
  fleet: z.array(ShipRefSchema),
});

export const ExterminateSnapshotSchema = CommandSnapshotBase.extend({
  type: z.literal('exterminate'),
  invasionsAllowed: z.number().int().min(0),
  invasionsMade: z.number().int().min(0),
  invadedHex: HexCoordSchema.nullable(),
  invadingHexes: z.array(HexCoordSchema),
  shipsCommitted: z.number().int().min(0),
  maxShips: z.number().int().min(0),
});

export const CommandSnapshotSchema = z.discriminatedUnion('type', [
  ExpandSnapshotSchema,
  ExploreSnapshotSchema,
  ExterminateSnapshotSchema,
]);

export type ExpandSnapshot = z.infer<typeof ExpandSnapshotSchema>;
export type ExploreSnapshot = z.infer<typeof ExploreSnapshotSchema>;
export type ExterminateSnapshot = z.infer<typeof ExterminateSnapshotSchema>;
export type CommandSnapshot = z.infer<typeof CommandSnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Phase progress
// ═══════════════════════════════════════════════════════════════════════════

export const StateSnapshotSchema = z.discriminatedUnion('phase', [
  z.object({ phase: z.literal('deploy'), placementsMade: z.number().int().min(0) }),
  z.object({ phase: z.literal('plan'), playersPlanned: z.number().int().min(0) }),
  z.object({
    phase: z.literal('perform'),
    subPhase: z.number().int().min(0).max(3),
    commandIndex: z.number().int().min(0),
    efficiencies: z.array(z.array(z.number().int().min(0))).nullable(),
    playerOrder: z.array(z.array(PlayerColorSchema)).nullable(),
    command: CommandSnapshotSchema.nullable(),
  }),
  z.object({ phase: z.literal('exploit'), playerIndex: z.number().int().min(0) }),
  z.object({ phase: z.literal('end_round') }),
  z.object({
    phase: z.literal('end_game'),
    finalScoringDone: z.boolean(),
  }),
]);

export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Whole game
// ═══════════════════════════════════════════════════════════════════════════

export const ShipSnapshotSchema = z.object({
  deployed: z.boolean(),
  hasMoved: z.boolean(),
  hasInvaded: z.boolean(),
});

export const PlayerSnapshotSchema = z.object({
  name: z.string().min(1),
  color: PlayerColorSchema,
  strategy: z.enum(['human', 'aggressive', 'friendly']),
  score: z.number().int().min(0),
  chosenCommands: z.array(CommandIdSchema).nullable(),
  ships: z.array(ShipSnapshotSchema).length(15),
});

export const HexSnapshotSchema = HexCoordSchema.extend({
  ships: z.array(ShipRefSchema).min(1),
});

export const GameSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  started: z.boolean(),
  turn: z.number().int().min(1),
  currentPlayer: PlayerColorSchema.nullable(),
  board: z.object({
    seed: z.number().int().nullable(),
    layout: BoardLayoutSchema,
    scoredSectors: z.array(z.number().int().min(0).max(8)),
    /** Occupied hexes only; ships listed oldest first. */
    hexes: z.array(HexSnapshotSchema),
  }),
  /** Current turn order. */
  players: z.array(PlayerSnapshotSchema).max(3),
  state: StateSnapshotSchema,
});

export type PlayerSnapshot = z.infer<typeof PlayerSnapshotSchema>;
export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;
