import type { Hex } from '../board/Hex';
import type { Ship } from '../board/Ship';
import type { ExploreSnapshot } from '../contracts/schemas';
import type {
  Decision,
  DecisionOutcome,
  ExploreNextRequest,
  ExploreStartRequest,
} from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { Player } from '../players/Player';
import { COMMAND_IDS, EXPLORE_MAX_RANGE, allowanceForEfficiency } from '../types';
import { Command } from './Command';
import type { CommandContext } from './Command';

export interface RestoredExplore {
  snapshot: ExploreSnapshot;
  path: Hex[];
  fleet: Ship[];
}

/**
 * Explore: move fleets across the map. Up to `4 - efficiency` movements; each
 * one starts on a hex the player holds, travels at most two hexes and ends
 * early on entering the Tri-Prime.
 *
 * While a movement is in progress its ships are in the fleet, not on any hex.
 */
export class Explore extends Command {
  readonly id = COMMAND_IDS.EXPLORE;
  private readonly movementsAllowed: number;
  private movementsMadeCount = 0;
  private readonly pathHexes: Hex[] = [];
  private readonly fleetShips: Ship[] = [];

  constructor(context: CommandContext, player: Player, efficiency: number, restored?: RestoredExplore) {
    super(context, player, efficiency);
    if (restored) {
      this.movementsAllowed = restored.snapshot.movementsAllowed;
      this.movementsMadeCount = restored.snapshot.movementsMade;
      this.finished = restored.snapshot.finished;
      this.pathHexes.push(...restored.path);
      this.fleetShips.push(...restored.fleet);
    } else {
      this.movementsAllowed = Math.max(0, allowanceForEfficiency(efficiency));
    }
  }

  get movementsMade(): number {
    return this.movementsMadeCount;
  }

  get totalMovements(): number {
    return this.movementsAllowed;
  }

  get path(): readonly Hex[] {
    return this.pathHexes;
  }

  get fleet(): readonly Ship[] {
    return this.fleetShips;
  }

  get currentHex(): Hex | undefined {
    return this.pathHexes[this.pathHexes.length - 1];
  }

  hasReachedMovementLimit(): boolean {
    return this.movementsMadeCount >= this.movementsAllowed;
  }

  // ---------------------------------------------------------------------------
  // Legal choices
  // ---------------------------------------------------------------------------

  private hasOpenNeighbor(hex: Hex): boolean {
    return hex.neighbors.some((neighbor) => neighbor.isAccessibleTo(this.player));
  }

  hexesCanStartExplore(): Hex[] {
    return this.context.board
      .hexesOccupiedBy(this.player)
      .filter((hex) => hex.unmovedShips().length > 0 && this.hasOpenNeighbor(hex));
  }

  canStartExplore(hex: Hex): boolean {
    return this.hexesCanStartExplore().includes(hex);
  }

  hexesCanExploreNext(): Hex[] {
    const current = this.currentHex;
    if (!current) {
      return [];
    }
    return current.neighbors.filter((neighbor) => neighbor.isAccessibleTo(this.player));
  }

  /**
   * Fleet rule for one step: leaving ships behind must keep at least one in
   * the fleet, picking up needs enough unmoved ships at the current hex, and
   * a plain step needs a non-empty fleet.
   */
  canMoveFleet(fleetAdjustment: number): boolean {
    if (!Number.isInteger(fleetAdjustment)) {
      return false;
    }
    const current = this.currentHex;
    if (!current) {
      return false;
    }
    if (fleetAdjustment < 0) {
      return this.fleetShips.length > -fleetAdjustment;
    }
    if (fleetAdjustment > 0) {
      return current.unmovedShips().length >= fleetAdjustment;
    }
    return this.fleetShips.length > 0;
  }

  private shouldFinalizeMovement(nextOptions: readonly Hex[]): boolean {
    const current = this.currentHex;
    if (!current) {
      return false;
    }
    return (
      this.pathHexes.length > EXPLORE_MAX_RANGE ||
      (this.pathHexes.length > 1 && current.isTriPrime) ||
      nextOptions.length === 0
    );
  }

  // ---------------------------------------------------------------------------
  // Mutators
  // ---------------------------------------------------------------------------

  startExplore(hex: Hex): boolean {
    if (this.finished || this.pathHexes.length > 0 || this.hasReachedMovementLimit()) {
      return false;
    }
    if (!this.canStartExplore(hex)) {
      return false;
    }
    this.pathHexes.push(hex);
    return true;
  }

  exploreNext(hex: Hex, fleetAdjustment: number): boolean {
    if (this.finished || this.pathHexes.length === 0) {
      return false;
    }
    if (!this.hexesCanExploreNext().includes(hex) || !this.canMoveFleet(fleetAdjustment)) {
      return false;
    }
    const current = this.currentHex;
    if (!current) {
      return false;
    }

    if (fleetAdjustment > 0) {
      const joining = current.unmovedShips().slice(0, fleetAdjustment);
      joining.forEach((ship) => ship.markMoved());
      current.removeShips(joining);
      this.fleetShips.push(...joining);
    } else if (fleetAdjustment < 0) {
      current.addShips(this.fleetShips.splice(0, -fleetAdjustment));
    }

    this.pathHexes.push(hex);
    return true;
  }

  /** Lands the fleet on the last hex of the path and counts the movement. */
  finishCurrentMovement(): void {
    const destination = this.currentHex;
    if (!destination) {
      return;
    }
    destination.addShips(this.fleetShips.splice(0, this.fleetShips.length));
    this.pathHexes.length = 0;
    this.movementsMadeCount++;
  }

  override finishCommand(): void {
    this.finishCurrentMovement();
    super.finishCommand();
  }

  // ---------------------------------------------------------------------------
  // Decisions
  // ---------------------------------------------------------------------------

  nextRequest(): ExploreStartRequest | ExploreNextRequest | null {
    while (!this.finished) {
      const current = this.currentHex;
      if (!current) {
        const starts = this.hexesCanStartExplore();
        if (this.hasReachedMovementLimit() || starts.length === 0) {
          this.finishCommand();
          return null;
        }
        return {
          ...this.requestBase(
            `Choose a hex to start movement ${this.movementsMadeCount + 1} of ${this.movementsAllowed}`
          ),
          type: 'explore_choose_start',
          options: starts.map((hex) => hex.coord),
          movementsMade: this.movementsMadeCount,
          movementsAllowed: this.movementsAllowed,
        };
      }

      const next = this.hexesCanExploreNext();
      if (this.shouldFinalizeMovement(next)) {
        this.finishCurrentMovement();
        continue;
      }
      return {
        ...this.requestBase('Choose the next hex for your fleet'),
        type: 'explore_choose_next',
        options: next.map((hex) => hex.coord),
        path: this.pathHexes.map((hex) => hex.coord),
        fleetSize: this.fleetShips.length,
        unmovedShipsAtCurrent: current.unmovedShips().length,
        movementsMade: this.movementsMadeCount,
        movementsAllowed: this.movementsAllowed,
      };
    }
    return null;
  }

  protected applyDecision(decision: Decision): DecisionOutcome {
    switch (decision.type) {
      case 'explore_start': {
        if (this.pathHexes.length > 0) {
          return rejected('A movement is already in progress');
        }
        const hex = this.pick(this.hexesCanStartExplore(), decision.hex);
        if (!hex || !this.startExplore(hex)) {
          return rejected('Cannot start a movement from this hex');
        }
        return ACCEPTED;
      }
      case 'explore_next': {
        if (this.pathHexes.length === 0) {
          return rejected('No movement in progress');
        }
        const hex = this.pick(this.hexesCanExploreNext(), decision.hex);
        if (!hex) {
          return rejected('Hex is not reachable from the current position');
        }
        if (!this.exploreNext(hex, decision.fleetAdjustment)) {
          return rejected('Fleet adjustment is not possible');
        }
        return ACCEPTED;
      }
      case 'explore_stop_movement': {
        if (this.pathHexes.length === 0) {
          return rejected('No movement in progress');
        }
        this.finishCurrentMovement();
        return ACCEPTED;
      }
      default:
        return rejected(`Explore does not accept '${decision.type}'`);
    }
  }

  snapshot(): ExploreSnapshot {
    return {
      type: 'explore',
      player: this.player.color,
      efficiency: this.efficiency,
      finished: this.finished,
      movementsAllowed: this.movementsAllowed,
      movementsMade: this.movementsMadeCount,
      path: this.pathHexes.map((hex) => hex.coord),
      fleet: this.fleetShips.map((ship) => ({ owner: ship.owner.color, index: ship.index })),
    };
  }
}
