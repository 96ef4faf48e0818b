import type { StateSnapshot } from '../contracts/schemas';
import { EngineErrorCode, InvalidState } from '../errors';
import type { GameResult } from '../events';
import type { Game } from '../Game';
import type { Player } from '../players/Player';
import { GameState } from './GameState';
import type { StateStep } from './GameState';

/**
 * Winner by score. The first player in turn order holding the top score wins;
 * any other player on the same score is reported as tied.
 */
export function computeResult(players: readonly Player[]): GameResult {
  if (players.length === 0) {
    throw new InvalidState(
      EngineErrorCode.STATE_NO_PLAYERS,
      'Cannot determine a winner without players',
      {},
      'EndGameState'
    );
  }
  let winner = players[0];
  for (const player of players) {
    if (player.score > winner.score) {
      winner = player;
    }
  }
  const tiedPlayers = players
    .filter((player) => player.score === winner.score)
    .map((player) => player.color);
  return {
    winner: winner.color,
    winnerName: winner.name,
    scores: players.map((player) => ({
      color: player.color,
      name: player.name,
      score: player.score,
    })),
    tie: tiedPlayers.length > 1,
    tiedPlayers,
  };
}

/** Final scoring: every sector once more, at double value. Terminal. */
export class EndGameState extends GameState {
  readonly phase = 'end_game';
  private finalScoringDone: boolean;

  constructor(game: Game, finalScoringDone = false) {
    super(game);
    this.finalScoringDone = finalScoringDone;
  }

  step(): StateStep {
    const game = this.game;
    if (this.finalScoringDone) {
      game.recordResult(computeResult(game.players));
      return { kind: 'terminal' };
    }

    // Fail before touching scores when there is nobody to score.
    computeResult(game.players);

    for (const sector of game.board.sectors) {
      const awards = sector.scoreSector(true);
      game.events.emitEvent({
        type: 'sector_scored',
        sectorId: sector.id,
        endOfGame: true,
        awards: awards.map((award) => ({
          player: award.player.color,
          hex: award.hex.coord,
          points: award.points,
        })),
      });
    }
    this.finalScoringDone = true;

    const result = computeResult(game.players);
    game.recordResult(result);
    game.events.emitEvent({ type: 'game_ended', ...result });
    return { kind: 'terminal' };
  }

  snapshot(): StateSnapshot {
    return { phase: this.phase, finalScoringDone: this.finalScoringDone };
  }
}
