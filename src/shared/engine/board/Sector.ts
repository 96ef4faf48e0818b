import type { Player } from '../players/Player';
import type { Hex } from './Hex';

export interface SectorAward {
  player: Player;
  hex: Hex;
  points: number;
}

/**
 * A scoring region. Non-central sectors own three systems (two level 1, one
 * level 2); the central sector owns only the Tri-Prime.
 */
export class Sector {
  private readonly systems: Hex[] = [];
  private scoredFlag = false;

  constructor(
    readonly id: number,
    readonly isCentral: boolean
  ) {}

  get systemHexes(): readonly Hex[] {
    return this.systems;
  }

  addSystemHex(hex: Hex): void {
    this.systems.push(hex);
  }

  get scored(): boolean {
    return this.scoredFlag;
  }

  resetScored(): void {
    this.scoredFlag = false;
  }

  /** Restoring a stored game only. */
  restoreScored(scored: boolean): void {
    this.scoredFlag = scored;
  }

  isOccupied(): boolean {
    return this.systems.some((hex) => hex.isOccupied());
  }

  isOccupiedBy(player: Player): boolean {
    return this.systems.some((hex) => hex.isControlledBy(player));
  }

  /**
   * Credits every controlled system's level to its controller, doubled at the
   * end of the game. Only exploitation scoring marks the sector as scored.
   */
  scoreSector(endOfGame: boolean): SectorAward[] {
    const multiplier = endOfGame ? 2 : 1;
    const awards: SectorAward[] = [];
    for (const hex of this.systems) {
      const controller = hex.controller;
      if (controller === null) {
        continue;
      }
      const points = hex.level * multiplier;
      controller.addToScore(points);
      awards.push({ player: controller, hex, points });
    }
    if (!endOfGame) {
      this.scoredFlag = true;
    }
    return awards;
  }

  /** Points `player` would collect by exploiting this sector now. */
  getScorePlayerExploit(player: Player): number {
    return this.systems
      .filter((hex) => hex.isControlledBy(player))
      .reduce((sum, hex) => sum + hex.level, 0);
  }
}
