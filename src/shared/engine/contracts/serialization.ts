/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Game Serialization
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Converts a live Game to a plain JSON snapshot and back. A restored game
 * resumes at the same pending decision; only the request id differs.
 */

import { Board } from '../board/Board';
import type { Hex } from '../board/Hex';
import type { Ship } from '../board/Ship';
import { Expand } from '../commands/Expand';
import { Explore } from '../commands/Explore';
import { Exterminate } from '../commands/Exterminate';
import type { Command } from '../commands/Command';
import { EngineError, EngineErrorCode, InvalidState } from '../errors';
import type { GameEventBus } from '../events';
import { Game } from '../Game';
import { Player } from '../players/Player';
import { DeployState } from '../states/DeployState';
import { EndGameState } from '../states/EndGameState';
import { EndRoundState } from '../states/EndRoundState';
import { ExploitState } from '../states/ExploitState';
import type { GameState } from '../states/GameState';
import { PerformState } from '../states/PerformState';
import { PlanState } from '../states/PlanState';
import type { StrategyFactory } from '../strategy';
import type { HexCoord, PlayerColor } from '../types';
import { GameSnapshotSchema, SNAPSHOT_VERSION } from './schemas';
import type { CommandSnapshot, GameSnapshot, ShipRef, StateSnapshot } from './schemas';

// ═══════════════════════════════════════════════════════════════════════════
// Serialize
// ═══════════════════════════════════════════════════════════════════════════

function shipRef(ship: Ship): ShipRef {
  return { owner: ship.owner.color, index: ship.index };
}

export function serializeGame(game: Game): GameSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    started: game.isStarted,
    turn: game.turn,
    currentPlayer: game.currentPlayer ? game.currentPlayer.color : null,
    board: {
      seed: game.board.seed,
      layout: game.board.layout,
      scoredSectors: game.board.sectors.filter((sector) => sector.scored).map((sector) => sector.id),
      hexes: game.board.hexes
        .filter((hex) => hex.isOccupied())
        .map((hex) => ({ x: hex.x, y: hex.y, ships: hex.ships.map(shipRef) })),
    },
    players: game.players.map((player) => ({
      name: player.name,
      color: player.color,
      strategy: player.strategy.profile,
      score: player.score,
      chosenCommands: player.chosenCommands ? [...player.chosenCommands] : null,
      ships: player.ships.map((ship) => ({
        deployed: ship.deployed,
        hasMoved: ship.hasMoved,
        hasInvaded: ship.hasInvaded,
      })),
    })),
    state: game.currentState.snapshot(),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Deserialize
// ═══════════════════════════════════════════════════════════════════════════

function corrupt(message: string, context: Record<string, unknown> = {}): InvalidState {
  return new InvalidState(EngineErrorCode.STATE_SNAPSHOT_INVALID, message, context, 'Serialization');
}

class SnapshotReader {
  private readonly located = new Set<Ship>();

  constructor(
    readonly board: Board,
    readonly players: Player[]
  ) {}

  player(color: PlayerColor): Player {
    const player = this.players.find((candidate) => candidate.color === color);
    if (!player) {
      throw corrupt('Snapshot references a missing player', { color });
    }
    return player;
  }

  hex(coord: HexCoord): Hex {
    const hex = this.board.hexAt(coord);
    if (!hex) {
      throw corrupt('Snapshot references a missing hex', { x: coord.x, y: coord.y });
    }
    return hex;
  }

  /** Resolves a ship reference; each deployed ship may be placed only once. */
  ship(ref: ShipRef): Ship {
    const ship = this.player(ref.owner).ships[ref.index];
    if (!ship || !ship.deployed || this.located.has(ship)) {
      throw corrupt('Ship is undeployed or placed twice', { ...ref });
    }
    this.located.add(ship);
    return ship;
  }

  assertAllLocated(): void {
    for (const player of this.players) {
      for (const ship of player.ships) {
        if (ship.deployed && !this.located.has(ship)) {
          throw corrupt('Deployed ship has no position', { owner: player.color, index: ship.index });
        }
      }
    }
  }
}

function restoreCommand(reader: SnapshotReader, context: Game['commandContext'], snapshot: CommandSnapshot): Command {
  const player = reader.player(snapshot.player);
  switch (snapshot.type) {
    case 'expand':
      return new Expand(context, player, snapshot.efficiency, snapshot);
    case 'explore':
      return new Explore(context, player, snapshot.efficiency, {
        snapshot,
        path: snapshot.path.map((coord) => reader.hex(coord)),
        fleet: snapshot.fleet.map((ref) => reader.ship(ref)),
      });
    case 'exterminate':
      return new Exterminate(context, player, snapshot.efficiency, {
        snapshot,
        invadedHex: snapshot.invadedHex ? reader.hex(snapshot.invadedHex) : null,
        invadingHexes: snapshot.invadingHexes.map((coord) => reader.hex(coord)),
      });
  }
}

function restoreState(game: Game, reader: SnapshotReader, snapshot: StateSnapshot): GameState {
  switch (snapshot.phase) {
    case 'deploy':
      return new DeployState(game, snapshot.placementsMade);
    case 'plan':
      return new PlanState(game, snapshot.playersPlanned);
    case 'perform': {
      if (snapshot.efficiencies === null || snapshot.playerOrder === null) {
        return new PerformState(game);
      }
      return new PerformState(game, {
        subPhase: snapshot.subPhase,
        commandIndex: snapshot.commandIndex,
        efficiencies: snapshot.efficiencies.map((row) => [...row]),
        playerOrder: snapshot.playerOrder.map((queue) => queue.map((color) => reader.player(color))),
        command: snapshot.command ? restoreCommand(reader, game.commandContext, snapshot.command) : null,
      });
    }
    case 'exploit':
      return new ExploitState(game, snapshot.playerIndex);
    case 'end_round':
      return new EndRoundState(game);
    case 'end_game':
      return new EndGameState(game, snapshot.finalScoringDone);
  }
}

/**
 * Rebuilds a game from a stored snapshot. `raw` is validated first; any
 * inconsistency (unknown hex, a ship in two places, a deployed ship nowhere)
 * raises InvalidState with STATE_SNAPSHOT_INVALID.
 */
export function deserializeGame(
  raw: unknown,
  strategyFactory: StrategyFactory,
  events?: GameEventBus
): Game {
  const parsed = GameSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw corrupt('Snapshot does not match the expected shape', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const snapshot = parsed.data;

  try {
    const board = new Board({
      layout: snapshot.board.layout,
      seed: snapshot.board.seed ?? undefined,
    });
    const players = snapshot.players.map((stored) => {
      const player = new Player(stored.name, stored.color, strategyFactory(stored.strategy, stored.color));
      player.restoreScore(stored.score);
      player.setChosenCommands(stored.chosenCommands);
      stored.ships.forEach((flags, index) => player.ships[index].restore(flags));
      return player;
    });
    if (new Set(players.map((player) => player.color)).size !== players.length) {
      throw corrupt('Snapshot repeats a player colour');
    }

    const reader = new SnapshotReader(board, players);
    for (const stored of snapshot.board.hexes) {
      reader.hex(stored).addShips(stored.ships.map((ref) => reader.ship(ref)));
    }
    for (const sectorId of snapshot.board.scoredSectors) {
      board.sector(sectorId).restoreScored(true);
    }

    const currentPlayer = snapshot.currentPlayer ? reader.player(snapshot.currentPlayer) : null;

    return Game.restore({
      board,
      players,
      turn: snapshot.turn,
      currentPlayer,
      started: snapshot.started,
      events,
      buildState: (game) => {
        const state = restoreState(game, reader, snapshot.state);
        reader.assertAllLocated();
        return state;
      },
    });
  } catch (error) {
    if (error instanceof EngineError && error.code !== EngineErrorCode.STATE_SNAPSHOT_INVALID) {
      throw corrupt(error.message, { cause: error.code, ...error.context });
    }
    throw error;
  }
}
