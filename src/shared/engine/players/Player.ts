import { Ship } from '../board/Ship';
import { EngineErrorCode, InvalidState } from '../errors';
import type { Strategy } from '../strategy';
import type { CommandId, PlayerColor } from '../types';
import { SHIPS_PER_PLAYER } from '../types';

/**
 * A seat at the table: its colour, fleet, score and the plan chosen for the
 * current round. Decisions are made by the attached strategy.
 */
export class Player {
  readonly ships: readonly Ship[];
  private scoreValue = 0;
  private plan: CommandId[] | null = null;

  constructor(
    readonly name: string,
    readonly color: PlayerColor,
    public strategy: Strategy
  ) {
    const ships: Ship[] = [];
    for (let i = 0; i < SHIPS_PER_PLAYER; i++) {
      ships.push(new Ship(this, i));
    }
    this.ships = ships;
  }

  get score(): number {
    return this.scoreValue;
  }

  addToScore(points: number): void {
    this.scoreValue += points;
  }

  /** Restoring a stored game only. */
  restoreScore(score: number): void {
    this.scoreValue = score;
  }

  get chosenCommands(): readonly CommandId[] | null {
    return this.plan;
  }

  setChosenCommands(commands: readonly CommandId[] | null): void {
    this.plan = commands ? [...commands] : null;
  }

  /** Command played in perform sub-phase `subPhase` (0-based). */
  commandForSubPhase(subPhase: number): CommandId {
    const command = this.plan?.[subPhase];
    if (command === undefined) {
      throw new InvalidState(
        EngineErrorCode.STATE_UNKNOWN_COMMAND,
        'Player has no command planned for this sub-phase',
        { player: this.color, subPhase }
      );
    }
    return command;
  }

  undeployedShips(): Ship[] {
    return this.ships.filter((ship) => !ship.deployed);
  }

  deployedShips(): Ship[] {
    return this.ships.filter((ship) => ship.deployed);
  }

  /**
   * Marks the first `count` pool ships as deployed and hands them to the
   * caller, who is responsible for placing them.
   */
  takeFromPool(count: number): Ship[] {
    const ships = this.undeployedShips().slice(0, Math.max(0, count));
    ships.forEach((ship) => ship.deploy());
    return ships;
  }

  resetShipsForNewRound(): void {
    this.ships.forEach((ship) => ship.resetRoundFlags());
  }

  isEliminated(): boolean {
    return this.ships.every((ship) => !ship.deployed);
  }
}
