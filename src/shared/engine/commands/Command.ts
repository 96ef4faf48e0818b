import type { Board } from '../board/Board';
import type { CommandSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome, DecisionRequest } from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { GameEventBus } from '../events';
import type { Player } from '../players/Player';
import type { CommandId, CommandName, HexCoord } from '../types';
import { COMMAND_NAMES, coordKey } from '../types';
import type { Hex } from '../board/Hex';

/** What a command needs from the surrounding game. */
export interface CommandContext {
  board: Board;
  events: GameEventBus;
  newRequestId: () => string;
}

/**
 * One player's execution of one command during a perform sub-phase.
 *
 * A command is a small state machine of its own: `nextRequest()` reports what
 * it needs next (or null once it is over) and `apply()` validates and applies
 * the player's answer. The public mutators are the same operations the
 * decisions map onto, so hosts and tests can drive a command directly.
 */
export abstract class Command {
  abstract readonly id: CommandId;
  protected finished = false;

  constructor(
    protected readonly context: CommandContext,
    readonly player: Player,
    /** Number of players who chose this command in this sub-phase. */
    readonly efficiency: number
  ) {}

  get name(): CommandName {
    return COMMAND_NAMES[this.id];
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * The decision this command is waiting for, or null when it has finished.
   * May finish the command (or finalize an Explore movement) as a side effect
   * when no further choice exists.
   */
  abstract nextRequest(): DecisionRequest | null;

  apply(decision: Decision): DecisionOutcome {
    if (this.finished) {
      return rejected('Command is already finished');
    }
    if (decision.type === 'finish_command') {
      this.finishCommand();
      return ACCEPTED;
    }
    return this.applyDecision(decision);
  }

  protected abstract applyDecision(decision: Decision): DecisionOutcome;

  finishCommand(): void {
    this.finished = true;
  }

  abstract snapshot(): CommandSnapshot;

  protected requestBase(prompt: string): { id: string; player: Player['color']; prompt: string } {
    return { id: this.context.newRequestId(), player: this.player.color, prompt };
  }

  /** Resolves a chosen coordinate against a list of legal hexes. */
  protected pick(candidates: readonly Hex[], coord: HexCoord): Hex | undefined {
    const key = coordKey(coord);
    return candidates.find((hex) => hex.key === key);
  }
}
