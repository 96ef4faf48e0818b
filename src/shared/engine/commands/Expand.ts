import type { Hex } from '../board/Hex';
import type { ExpandSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome, ExpandHexRequest } from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { Player } from '../players/Player';
import { COMMAND_IDS, allowanceForEfficiency } from '../types';
import { Command } from './Command';
import type { CommandContext } from './Command';

/**
 * Expand: add ships from the pool to systems the player already controls.
 * The quota is `min(4 - efficiency, ships in pool)` fixed at creation.
 */
export class Expand extends Command {
  readonly id = COMMAND_IDS.EXPAND;
  private readonly shipsAllowed: number;
  private shipsAddedCount = 0;

  constructor(context: CommandContext, player: Player, efficiency: number, restored?: ExpandSnapshot) {
    super(context, player, efficiency);
    if (restored) {
      this.shipsAllowed = restored.shipsAllowed;
      this.shipsAddedCount = restored.shipsAdded;
      this.finished = restored.finished;
    } else {
      this.shipsAllowed = Math.max(
        0,
        Math.min(allowanceForEfficiency(efficiency), player.undeployedShips().length)
      );
    }
  }

  get totalShipsCanAdd(): number {
    return this.shipsAllowed;
  }

  get shipsAdded(): number {
    return this.shipsAddedCount;
  }

  get shipsRemaining(): number {
    return this.shipsAllowed - this.shipsAddedCount;
  }

  hexesCanExpand(): Hex[] {
    return this.context.board.systemsControlledBy(this.player);
  }

  canExpandFleet(hex: Hex, count: number): boolean {
    return (
      hex.isSystem &&
      hex.isControlledBy(this.player) &&
      Number.isInteger(count) &&
      count >= 1 &&
      count <= this.shipsRemaining &&
      count <= this.player.undeployedShips().length
    );
  }

  /** Deploys `count` pool ships onto `hex`. Returns false and changes nothing when illegal. */
  addShips(hex: Hex, count: number): boolean {
    if (this.finished || !this.canExpandFleet(hex, count)) {
      return false;
    }
    hex.addShips(this.player.takeFromPool(count));
    this.shipsAddedCount += count;
    this.context.events.emitEvent({
      type: 'ships_deployed',
      player: this.player.color,
      hex: hex.coord,
      count,
    });
    return true;
  }

  nextRequest(): ExpandHexRequest | null {
    if (this.finished) {
      return null;
    }
    const options = this.hexesCanExpand();
    if (this.shipsRemaining <= 0 || options.length === 0) {
      this.finishCommand();
      return null;
    }
    return {
      ...this.requestBase(`Choose a system to reinforce (${this.shipsRemaining} ship(s) left)`),
      type: 'expand_choose_hex',
      options: options.map((hex) => hex.coord),
      shipsAdded: this.shipsAddedCount,
      shipsAllowed: this.shipsAllowed,
    };
  }

  protected applyDecision(decision: Decision): DecisionOutcome {
    if (decision.type !== 'expand') {
      return rejected(`Expand does not accept '${decision.type}'`);
    }
    const hex = this.pick(this.hexesCanExpand(), decision.hex);
    if (!hex) {
      return rejected('Hex is not a system you control');
    }
    return this.addShips(hex, decision.ships)
      ? ACCEPTED
      : rejected(`Ship count must be between 1 and ${this.shipsRemaining}`);
  }

  snapshot(): ExpandSnapshot {
    return {
      type: 'expand',
      player: this.player.color,
      efficiency: this.efficiency,
      finished: this.finished,
      shipsAllowed: this.shipsAllowed,
      shipsAdded: this.shipsAddedCount,
    };
  }
}
