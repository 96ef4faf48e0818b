import type { StateSnapshot } from '../contracts/schemas';
import { MAX_TURNS } from '../types';
import { EndGameState } from './EndGameState';
import { GameState } from './GameState';
import type { StateStep } from './GameState';
import { PlanState } from './PlanState';

/**
 * Round cleanup: enforce hex capacity, clear exploitation marks, then either
 * end the game (after the ninth round, or as soon as a player has no ship
 * left on the board) or rotate the turn order and start the next round.
 */
export class EndRoundState extends GameState {
  readonly phase = 'end_round';

  step(): StateStep {
    const game = this.game;
    const removed = game.board.sweepOverCapacity();
    game.board.resetSectorsScored();
    game.events.emitEvent({ type: 'round_ended', turn: game.turn, shipsRemoved: removed.length });

    if (game.turn >= MAX_TURNS || game.players.some((player) => player.isEliminated())) {
      return { kind: 'transition', next: new EndGameState(game) };
    }

    game.rotatePlayers();
    game.players.forEach((player) => player.resetShipsForNewRound());
    game.advanceTurn();
    return { kind: 'transition', next: new PlanState(game) };
  }

  snapshot(): StateSnapshot {
    return { phase: this.phase };
  }
}
