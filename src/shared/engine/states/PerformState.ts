import type { Command } from '../commands/Command';
import { createCommand } from '../commands';
import type { StateSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome } from '../decisions';
import { rejected } from '../decisions';
import { EngineErrorCode, InvalidState } from '../errors';
import type { Game } from '../Game';
import type { Player } from '../players/Player';
import type { CommandId } from '../types';
import { PERFORM_SUB_PHASES, isCommandId } from '../types';
import { ExploitState } from './ExploitState';
import { GameState } from './GameState';
import type { StateStep } from './GameState';

/** `efficiencies[subPhase][commandId]`; index 0 of each row is unused. */
export type EfficiencyMatrix = number[][];

export interface PerformProgress {
  subPhase: number;
  commandIndex: number;
  efficiencies: EfficiencyMatrix;
  playerOrder: Player[][];
  command: Command | null;
}

/**
 * Counts, for every sub-phase, how many players chose each command.
 */
export function computeEfficiencies(players: readonly Player[]): EfficiencyMatrix {
  const matrix: EfficiencyMatrix = [];
  for (let subPhase = 0; subPhase < PERFORM_SUB_PHASES; subPhase++) {
    const row = [0, 0, 0, 0];
    for (const player of players) {
      const commandId = player.commandForSubPhase(subPhase);
      if (!isCommandId(commandId)) {
        throw new InvalidState(
          EngineErrorCode.STATE_UNKNOWN_COMMAND,
          'Unknown command id in plan',
          { player: player.color, subPhase, commandId },
          'PerformState'
        );
      }
      row[commandId]++;
    }
    matrix.push(row);
  }
  return matrix;
}

/** Players of one sub-phase ordered by command id; ties keep turn order. */
export function orderPlayersForSubPhase(players: readonly Player[], subPhase: number): Player[] {
  return [...players].sort(
    (a, b) => a.commandForSubPhase(subPhase) - b.commandForSubPhase(subPhase)
  );
}

/**
 * Three sub-phases. In each, every player executes the command planned for
 * that slot: all Expands first, then Explores, then Exterminates. A command's
 * strength shrinks with the number of players sharing it.
 */
export class PerformState extends GameState {
  readonly phase = 'perform';
  private subPhase = 0;
  private commandIndex = 0;
  private efficiencies: EfficiencyMatrix | null = null;
  private playerOrder: Player[][] | null = null;
  private command: Command | null = null;

  constructor(game: Game, restored?: PerformProgress) {
    super(game);
    if (restored) {
      this.subPhase = restored.subPhase;
      this.commandIndex = restored.commandIndex;
      this.efficiencies = restored.efficiencies;
      this.playerOrder = restored.playerOrder;
      this.command = restored.command;
    }
  }

  get currentSubPhase(): number {
    return this.subPhase;
  }

  get currentCommand(): Command | null {
    return this.command;
  }

  get efficiencyMatrix(): EfficiencyMatrix | null {
    return this.efficiencies;
  }

  efficiencyOf(subPhase: number, commandId: CommandId): number {
    return this.plan().efficiencies[subPhase][commandId];
  }

  private plan(): { efficiencies: EfficiencyMatrix; playerOrder: Player[][] } {
    if (this.efficiencies === null || this.playerOrder === null) {
      const players = this.game.players;
      this.efficiencies = computeEfficiencies(players);
      const order: Player[][] = [];
      for (let subPhase = 0; subPhase < PERFORM_SUB_PHASES; subPhase++) {
        order.push(orderPlayersForSubPhase(players, subPhase));
      }
      this.playerOrder = order;
    }
    return { efficiencies: this.efficiencies, playerOrder: this.playerOrder };
  }

  private announceSubPhase(efficiencies: EfficiencyMatrix, queue: readonly Player[]): void {
    const row = efficiencies[this.subPhase];
    this.game.events.emitEvent({
      type: 'command_efficiency',
      subPhase: this.subPhase,
      efficiencies: { 1: row[1], 2: row[2], 3: row[3] },
      order: queue.map((player) => player.color),
    });
  }

  step(): StateStep {
    const { efficiencies, playerOrder } = this.plan();

    while (this.subPhase < PERFORM_SUB_PHASES) {
      const queue = playerOrder[this.subPhase];
      if (this.commandIndex >= queue.length) {
        this.subPhase++;
        this.commandIndex = 0;
        continue;
      }

      if (this.command === null) {
        if (this.commandIndex === 0) {
          this.announceSubPhase(efficiencies, queue);
        }
        const player = queue[this.commandIndex];
        const commandId = player.commandForSubPhase(this.subPhase);
        this.command = createCommand(
          commandId,
          this.game.commandContext,
          player,
          efficiencies[this.subPhase][commandId]
        );
        this.game.setCurrentPlayer(player);
      }

      const request = this.command.nextRequest();
      if (request) {
        return { kind: 'decision', request };
      }
      this.command = null;
      this.commandIndex++;
    }

    return { kind: 'transition', next: new ExploitState(this.game) };
  }

  override apply(decision: Decision): DecisionOutcome {
    if (this.command === null) {
      return rejected('No command is being performed');
    }
    return this.command.apply(decision);
  }

  snapshot(): StateSnapshot {
    return {
      phase: this.phase,
      subPhase: this.subPhase,
      commandIndex: this.commandIndex,
      efficiencies: this.efficiencies ? this.efficiencies.map((row) => [...row]) : null,
      playerOrder: this.playerOrder
        ? this.playerOrder.map((queue) => queue.map((player) => player.color))
        : null,
      command: this.command ? this.command.snapshot() : null,
    };
  }
}
