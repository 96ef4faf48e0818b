import type { Hex } from '../board/Hex';
import type { ExterminateSnapshot } from '../contracts/schemas';
import type {
  Decision,
  DecisionOutcome,
  ExterminateShipsRequest,
  ExterminateTargetRequest,
} from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { Player } from '../players/Player';
import { COMMAND_IDS, allowanceForEfficiency } from '../types';
import { Command } from './Command';
import type { CommandContext } from './Command';

export interface RestoredExterminate {
  snapshot: ExterminateSnapshot;
  invadedHex: Hex | null;
  invadingHexes: Hex[];
}

export interface CombatResult {
  attackerLosses: number;
  defenderLosses: number;
  shipsLanded: number;
  controlTransferred: boolean;
}

/**
 * Exterminate: invade enemy-held systems from adjacent hexes. Up to
 * `4 - efficiency` invasions, each fed by one or more commitments of ships
 * that have not invaded yet this round.
 *
 * Combat is a one-for-one exchange: each committed ship destroys one
 * defender and is destroyed with it; survivors land and take the hex.
 */
export class Exterminate extends Command {
  readonly id = COMMAND_IDS.EXTERMINATE;
  private readonly invasionsAllowed: number;
  private invasionsMadeCount = 0;
  private invaded: Hex | null = null;
  private invading: Hex[] = [];
  private shipsCommitted = 0;
  /** Ships able to join the current invasion when it started; commits never exceed it. */
  private maxShips = 0;

  constructor(
    context: CommandContext,
    player: Player,
    efficiency: number,
    restored?: RestoredExterminate
  ) {
    super(context, player, efficiency);
    if (restored) {
      this.invasionsAllowed = restored.snapshot.invasionsAllowed;
      this.invasionsMadeCount = restored.snapshot.invasionsMade;
      this.finished = restored.snapshot.finished;
      this.invaded = restored.invadedHex;
      this.invading = [...restored.invadingHexes];
      this.shipsCommitted = restored.snapshot.shipsCommitted;
      this.maxShips = restored.snapshot.maxShips;
    } else {
      this.invasionsAllowed = Math.max(0, allowanceForEfficiency(efficiency));
    }
  }

  get invasionsMade(): number {
    return this.invasionsMadeCount;
  }

  get totalInvasions(): number {
    return this.invasionsAllowed;
  }

  get invadedHex(): Hex | null {
    return this.invaded;
  }

  get invadingHexes(): readonly Hex[] {
    return this.invading;
  }

  get shipsUsedCurrentInvasion(): number {
    return this.shipsCommitted;
  }

  get maxShipsCurrentInvasion(): number {
    return this.maxShips;
  }

  // ---------------------------------------------------------------------------
  // Legal choices
  // ---------------------------------------------------------------------------

  private launchHexesFor(target: Hex): Hex[] {
    return target.neighbors.filter(
      (neighbor) => neighbor.isControlledBy(this.player) && neighbor.uninvadedShips().length > 0
    );
  }

  /**
   * Systems held by another player that touch at least one of our hexes with
   * ships still able to invade.
   */
  hexesCanInvade(): Hex[] {
    return this.context.board.systems.filter(
      (hex) =>
        hex.isOccupied() &&
        !hex.isControlledBy(this.player) &&
        this.launchHexesFor(hex).length > 0
    );
  }

  canInvade(hex: Hex): boolean {
    return this.hexesCanInvade().includes(hex);
  }

  canAddShipsInvadingHex(hex: Hex, count: number): boolean {
    return (
      this.invaded !== null &&
      this.invading.includes(hex) &&
      Number.isInteger(count) &&
      count >= 1 &&
      count <= hex.uninvadedShips().length &&
      this.shipsCommitted + count <= this.maxShips
    );
  }

  // ---------------------------------------------------------------------------
  // Mutators
  // ---------------------------------------------------------------------------

  startInvadingHex(target: Hex): boolean {
    if (this.finished || this.invaded !== null || this.invasionsMadeCount >= this.invasionsAllowed) {
      return false;
    }
    if (!this.canInvade(target)) {
      return false;
    }
    this.invaded = target;
    this.invading = this.launchHexesFor(target);
    this.shipsCommitted = 0;
    this.maxShips = this.invading.reduce((sum, hex) => sum + hex.uninvadedShips().length, 0);
    return true;
  }

  /**
   * Sends `count` uninvaded ships from `from` into the current target and
   * resolves the exchange. Returns null and changes nothing when illegal.
   */
  addShipsInvadingHex(from: Hex, count: number): CombatResult | null {
    const target = this.invaded;
    if (this.finished || target === null || !this.canAddShipsInvadingHex(from, count)) {
      return null;
    }

    const attackers = from.uninvadedShips().slice(0, count);
    this.shipsCommitted += count;

    const defender = target.controller;
    let losses = 0;
    if (defender !== null && defender !== this.player) {
      losses = Math.min(target.shipCount, count);
      target.takeOldest(losses).forEach((ship) => ship.recall());
      const destroyed = attackers.slice(0, losses);
      from.removeShips(destroyed);
      destroyed.forEach((ship) => ship.recall());
    }

    const survivors = attackers.slice(losses);
    let controlTransferred = false;
    if (survivors.length > 0) {
      const heldBefore = target.isControlledBy(this.player);
      survivors.forEach((ship) => ship.markInvaded());
      from.removeShips(survivors);
      target.addShips(survivors);
      controlTransferred = !heldBefore;
    }

    if (from.uninvadedShips().length === 0) {
      this.invading = this.invading.filter((hex) => hex !== from);
    }

    const result: CombatResult = {
      attackerLosses: losses,
      defenderLosses: losses,
      shipsLanded: survivors.length,
      controlTransferred,
    };
    this.context.events.emitEvent({
      type: 'combat_resolved',
      attacker: this.player.color,
      defender: defender === this.player ? null : defender?.color ?? null,
      from: from.coord,
      target: target.coord,
      committed: count,
      ...result,
    });
    return result;
  }

  finishCurrentInvasion(): void {
    if (this.invaded === null) {
      return;
    }
    this.invaded = null;
    this.invading = [];
    this.shipsCommitted = 0;
    this.maxShips = 0;
    this.invasionsMadeCount++;
  }

  override finishCommand(): void {
    this.finishCurrentInvasion();
    super.finishCommand();
  }

  // ---------------------------------------------------------------------------
  // Decisions
  // ---------------------------------------------------------------------------

  nextRequest(): ExterminateTargetRequest | ExterminateShipsRequest | null {
    while (!this.finished) {
      const target = this.invaded;
      if (target === null) {
        const targets = this.hexesCanInvade();
        if (this.invasionsMadeCount >= this.invasionsAllowed || targets.length === 0) {
          this.finishCommand();
          return null;
        }
        return {
          ...this.requestBase(
            `Choose a system to invade (${this.invasionsMadeCount + 1} of ${this.invasionsAllowed})`
          ),
          type: 'exterminate_choose_target',
          options: targets.map((hex) => hex.coord),
          invasionsMade: this.invasionsMadeCount,
          invasionsAllowed: this.invasionsAllowed,
        };
      }

      if (this.invading.length === 0) {
        this.finishCurrentInvasion();
        continue;
      }
      return {
        ...this.requestBase('Choose a hex and a number of ships to send'),
        type: 'exterminate_choose_ships',
        target: target.coord,
        options: this.invading.map((hex) => ({
          hex: hex.coord,
          uninvadedShips: hex.uninvadedShips().length,
        })),
        defenderShips: target.isControlledBy(this.player) ? 0 : target.shipCount,
        shipsCommitted: this.shipsCommitted,
        maxShips: this.maxShips,
      };
    }
    return null;
  }

  protected applyDecision(decision: Decision): DecisionOutcome {
    switch (decision.type) {
      case 'exterminate_target': {
        if (this.invaded !== null) {
          return rejected('An invasion is already in progress');
        }
        const hex = this.pick(this.hexesCanInvade(), decision.hex);
        if (!hex || !this.startInvadingHex(hex)) {
          return rejected('This system cannot be invaded');
        }
        return ACCEPTED;
      }
      case 'exterminate_commit': {
        if (this.invaded === null) {
          return rejected('No invasion in progress');
        }
        const hex = this.pick(this.invading, decision.hex);
        if (!hex) {
          return rejected('Ships cannot be sent from this hex');
        }
        return this.addShipsInvadingHex(hex, decision.ships) !== null
          ? ACCEPTED
          : rejected(`Ship count must be between 1 and ${hex.uninvadedShips().length}`);
      }
      case 'exterminate_stop_invasion': {
        if (this.invaded === null) {
          return rejected('No invasion in progress');
        }
        this.finishCurrentInvasion();
        return ACCEPTED;
      }
      default:
        return rejected(`Exterminate does not accept '${decision.type}'`);
    }
  }

  snapshot(): ExterminateSnapshot {
    return {
      type: 'exterminate',
      player: this.player.color,
      efficiency: this.efficiency,
      finished: this.finished,
      invasionsAllowed: this.invasionsAllowed,
      invasionsMade: this.invasionsMadeCount,
      invadedHex: this.invaded ? this.invaded.coord : null,
      invadingHexes: this.invading.map((hex) => hex.coord),
      shipsCommitted: this.shipsCommitted,
      maxShips: this.maxShips,
    };
  }
}
