import type { Player } from '../players/Player';

/**
 * One of a player's fifteen ships. A ship is either in its owner's pool
 * (`deployed === false`) or on exactly one hex or in one in-transit
 * Explore fleet.
 */
export class Ship {
  private deployedFlag = false;
  private movedFlag = false;
  private invadedFlag = false;

  constructor(
    readonly owner: Player,
    /** Position in the owner's fleet, stable for the whole game. */
    readonly index: number
  ) {}

  get deployed(): boolean {
    return this.deployedFlag;
  }

  get hasMoved(): boolean {
    return this.movedFlag;
  }

  get hasInvaded(): boolean {
    return this.invadedFlag;
  }

  deploy(): void {
    this.deployedFlag = true;
  }

  /** Back to the pool. Flags only mean something for ships on the board. */
  recall(): void {
    this.deployedFlag = false;
    this.movedFlag = false;
    this.invadedFlag = false;
  }

  markMoved(): void {
    this.movedFlag = true;
  }

  markInvaded(): void {
    this.invadedFlag = true;
  }

  resetRoundFlags(): void {
    this.movedFlag = false;
    this.invadedFlag = false;
  }

  /** Used when restoring a stored game. */
  restore(flags: { deployed: boolean; hasMoved: boolean; hasInvaded: boolean }): void {
    this.deployedFlag = flags.deployed;
    this.movedFlag = flags.deployed && flags.hasMoved;
    this.invadedFlag = flags.deployed && flags.hasInvaded;
  }
}
