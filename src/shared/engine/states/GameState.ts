import type { StateSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome, DecisionRequest } from '../decisions';
import { rejected } from '../decisions';
import type { Game } from '../Game';
import type { GamePhase } from '../types';

/**
 * What a state wants after advancing as far as it can on its own.
 */
export type StateStep =
  | { kind: 'decision'; request: DecisionRequest }
  | { kind: 'transition'; next: GameState }
  | { kind: 'terminal' };

/**
 * One phase of the game loop. The game repeatedly calls `step()` until a
 * state asks for a decision or the game is over; decisions are then routed to
 * `apply()`, which either changes the state or rejects the answer.
 */
export abstract class GameState {
  abstract readonly phase: GamePhase;

  constructor(protected readonly game: Game) {}

  abstract step(): StateStep;

  apply(decision: Decision): DecisionOutcome {
    return rejected(`No '${decision.type}' decision is expected during ${this.phase}`);
  }

  abstract snapshot(): StateSnapshot;
}
