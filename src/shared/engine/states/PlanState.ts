import type { StateSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome, PlanOrderRequest } from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { Game } from '../Game';
import type { CommandId } from '../types';
import { ALL_COMMAND_IDS, isCommandId } from '../types';
import { GameState } from './GameState';
import type { StateStep } from './GameState';
import { PerformState } from './PerformState';

/** Accepts an ordering of the three commands, each used exactly once. */
export function isValidPlan(order: readonly number[]): order is CommandId[] {
  return (
    order.length === ALL_COMMAND_IDS.length &&
    order.every(isCommandId) &&
    new Set(order).size === ALL_COMMAND_IDS.length
  );
}

/**
 * Every player, in turn order, secretly orders the three commands for the
 * round's three perform sub-phases.
 */
export class PlanState extends GameState {
  readonly phase = 'plan';
  private playersPlanned: number;

  constructor(game: Game, playersPlanned = 0) {
    super(game);
    this.playersPlanned = playersPlanned;
  }

  step(): StateStep {
    const players = this.game.players;
    if (this.playersPlanned >= players.length) {
      return { kind: 'transition', next: new PerformState(this.game) };
    }
    const player = players[this.playersPlanned];
    this.game.setCurrentPlayer(player);
    const request: PlanOrderRequest = {
      id: this.game.newRequestId(),
      player: player.color,
      prompt: 'Order your three commands for this round',
      type: 'plan_choose_order',
      options: [...ALL_COMMAND_IDS],
    };
    return { kind: 'decision', request };
  }

  override apply(decision: Decision): DecisionOutcome {
    if (decision.type !== 'plan') {
      return super.apply(decision);
    }
    if (!isValidPlan(decision.order)) {
      return rejected('The plan must order Expand, Explore and Exterminate once each');
    }
    this.game.players[this.playersPlanned].setChosenCommands(decision.order);
    this.playersPlanned++;
    return ACCEPTED;
  }

  snapshot(): StateSnapshot {
    return { phase: this.phase, playersPlanned: this.playersPlanned };
  }
}
