import { EngineErrorCode, InvalidState } from '../errors';
import type { Player } from '../players/Player';
import type { HexCoord } from '../types';
import { coordKey } from '../types';
import { neighborDirection } from './hexGeometry';
import type { Ship } from './Ship';

export type HexUpdateListener = (hex: Hex) => void;

/** Level carried by the merged central hex. */
export const TRI_PRIME_LEVEL = 3;

/**
 * A cell of the board. Level 0 is an empty hex, 1-2 a system, 3 the Tri-Prime.
 *
 * The controller is derived from the ships present, so a hex is controlled
 * exactly when it holds at least one ship, and all of its ships share one
 * owner.
 */
export class Hex {
  private levelValue = 0;
  private readonly neighborSet = new Set<Hex>();
  private readonly shipList: Ship[] = [];
  private readonly listeners = new Set<HexUpdateListener>();

  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  get coord(): HexCoord {
    return { x: this.x, y: this.y };
  }

  get key(): string {
    return coordKey(this);
  }

  get level(): number {
    return this.levelValue;
  }

  /** Board construction only. */
  setLevel(level: number): void {
    this.levelValue = level;
  }

  get isSystem(): boolean {
    return this.levelValue > 0;
  }

  get isTriPrime(): boolean {
    return this.levelValue === TRI_PRIME_LEVEL;
  }

  /** Ships allowed to remain here at the end of a round. */
  get capacity(): number {
    return this.levelValue + 1;
  }

  // ---------------------------------------------------------------------------
  // Topology
  // ---------------------------------------------------------------------------

  get neighbors(): Hex[] {
    return Array.from(this.neighborSet);
  }

  isNeighbor(other: Hex): boolean {
    return this.neighborSet.has(other);
  }

  addNeighbor(other: Hex): void {
    this.neighborSet.add(other);
  }

  removeNeighbor(other: Hex): void {
    this.neighborSet.delete(other);
  }

  /** Direction index 0..5 towards `other`, -1 when the grid offsets do not match. */
  neighborDirection(other: Hex): number {
    return neighborDirection(this, other);
  }

  // ---------------------------------------------------------------------------
  // Occupancy
  // ---------------------------------------------------------------------------

  get ships(): readonly Ship[] {
    return this.shipList;
  }

  get shipCount(): number {
    return this.shipList.length;
  }

  get controller(): Player | null {
    return this.shipList.length > 0 ? this.shipList[0].owner : null;
  }

  isOccupied(): boolean {
    return this.shipList.length > 0;
  }

  isControlledBy(player: Player): boolean {
    return this.controller === player;
  }

  /** Free for `player` to move into: empty, or already theirs. */
  isAccessibleTo(player: Player): boolean {
    const controller = this.controller;
    return controller === null || controller === player;
  }

  unmovedShips(): Ship[] {
    return this.shipList.filter((ship) => !ship.hasMoved);
  }

  uninvadedShips(): Ship[] {
    return this.shipList.filter((ship) => !ship.hasInvaded);
  }

  addShips(ships: readonly Ship[]): void {
    if (ships.length === 0) {
      return;
    }
    for (const ship of ships) {
      const controller = this.controller;
      if (controller !== null && controller !== ship.owner) {
        throw new InvalidState(
          EngineErrorCode.STATE_MIXED_OCCUPANCY,
          'Cannot place ships on a hex controlled by another player',
          { hex: this.coord, controller: controller.color, owner: ship.owner.color },
          'Hex'
        );
      }
      this.shipList.push(ship);
    }
    this.notify();
  }

  removeShips(ships: readonly Ship[]): void {
    if (ships.length === 0) {
      return;
    }
    for (const ship of ships) {
      const index = this.shipList.indexOf(ship);
      if (index >= 0) {
        this.shipList.splice(index, 1);
      }
    }
    this.notify();
  }

  /** Removes and returns the `count` oldest ships. */
  takeOldest(count: number): Ship[] {
    const taken = this.shipList.splice(0, Math.max(0, count));
    if (taken.length > 0) {
      this.notify();
    }
    return taken;
  }

  /**
   * Sends ships beyond capacity back to their owner's pool, oldest first.
   * Returns the ships removed.
   */
  sweepOverCapacity(): Ship[] {
    const excess = this.shipList.length - this.capacity;
    if (excess <= 0) {
      return [];
    }
    const removed = this.takeOldest(excess);
    removed.forEach((ship) => ship.recall());
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Update hook
  // ---------------------------------------------------------------------------

  onUpdate(listener: HexUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    this.listeners.forEach((listener) => listener(this));
  }
}
