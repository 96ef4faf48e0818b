import { BoardConstraintViolation, EngineErrorCode, entityNotFound } from '../errors';
import type { Player } from '../players/Player';
import type { Rng } from '../rng';
import { coinFlip, createRng, randomSeed, shuffleInPlace } from '../rng';
import type { HexCoord } from '../types';
import type { Ship } from './Ship';
import { GRID_COLUMNS, gridNeighbors, isOnGrid, rowsInColumn } from './hexGeometry';
import { Hex, TRI_PRIME_LEVEL } from './Hex';
import type { HexUpdateListener } from './Hex';
import { Sector } from './Sector';
import {
  CENTRAL_SECTOR_ID,
  EDGE_SECTOR_CARDS,
  EDGE_SECTOR_IDS,
  SECTOR_COUNT,
  SIDE_SECTOR_CARDS,
  SIDE_SECTOR_IDS,
  TRI_PRIME_CELLS,
  TRI_PRIME_COORD,
} from './sectorCards';
import type { SectorCard } from './sectorCards';

export interface SystemPlacement {
  x: number;
  y: number;
  level: number;
}

export interface SectorPlacement {
  id: number;
  systems: SystemPlacement[];
}

/** Where the systems of the eight outer sectors sit. */
export interface BoardLayout {
  sectors: SectorPlacement[];
}

export interface BoardOptions {
  /** Seed for a fresh random layout; with `layout`, only recorded. Ignored with `rng`. */
  seed?: number;
  rng?: Rng;
  /** Rebuild a known layout instead of generating one. */
  layout?: BoardLayout;
}

function placeEdgeCard(card: SectorCard, sectorId: number): SystemPlacement[] {
  const bottom = sectorId >= 6;
  return card.map(([cardX, cardY], position) => {
    let x = cardX;
    let y = cardY;
    if (bottom) {
      x = 6 + (2 - x);
      y = ((x & 1) ^ 1) - y;
    }
    y += 2 * (sectorId % 6);
    return { x, y, level: position < 2 ? 1 : 2 };
  });
}

function placeSideCard(card: SectorCard, sectorId: number, mirrored: boolean): SystemPlacement[] {
  return card.map(([cardX, cardY], position) => {
    let x = cardX;
    let y = cardY;
    if (mirrored) {
      x = 2 - x;
      y = (x & 1) - y;
    }
    x += 3;
    y += 2 * (sectorId % 3);
    return { x, y, level: position < 2 ? 1 : 2 };
  });
}

/**
 * Random layout: the six edge cards are dealt to the top and bottom sectors in
 * shuffled order (bottom ones mirrored), then the two side cards are dealt to
 * sectors 3 and 5, each mirrored on a coin flip.
 */
export function generateLayout(rng: Rng): BoardLayout {
  const sectors: SectorPlacement[] = [];

  const edgeIds = shuffleInPlace([...EDGE_SECTOR_IDS], rng);
  EDGE_SECTOR_CARDS.forEach((card, i) => {
    sectors.push({ id: edgeIds[i], systems: placeEdgeCard(card, edgeIds[i]) });
  });

  const sideIds = shuffleInPlace([...SIDE_SECTOR_IDS], rng);
  SIDE_SECTOR_CARDS.forEach((card, i) => {
    sectors.push({ id: sideIds[i], systems: placeSideCard(card, sideIds[i], coinFlip(rng)) });
  });

  sectors.sort((a, b) => a.id - b.id);
  return { sectors };
}

/**
 * The 9-column hex map, its nine sectors and the merged Tri-Prime hex.
 */
export class Board {
  /** Seed the layout was generated from, when it was generated from one. */
  readonly seed: number | null;
  readonly triPrime: Hex;

  private readonly grid: Array<Array<Hex | null>> = [];
  private readonly sectorList: Sector[] = [];
  private readonly sectorByHex = new Map<Hex, Sector>();
  private readonly placements: BoardLayout;

  constructor(options: BoardOptions = {}) {
    this.buildGrid();
    this.triPrime = this.mergeTriPrime();

    if (options.layout) {
      this.seed = options.seed ?? null;
      this.placements = options.layout;
    } else if (options.rng) {
      this.seed = null;
      this.placements = generateLayout(options.rng);
    } else {
      this.seed = options.seed ?? randomSeed();
      this.placements = generateLayout(createRng(this.seed));
    }

    this.buildSectors(this.placements);
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  private buildGrid(): void {
    for (let x = 0; x < GRID_COLUMNS; x++) {
      const column: Array<Hex | null> = [];
      for (let y = 0; y < rowsInColumn(x); y++) {
        column.push(new Hex(x, y));
      }
      this.grid.push(column);
    }

    for (const hex of this.hexes) {
      for (const coord of gridNeighbors(hex)) {
        hex.addNeighbor(this.requireHex(coord));
      }
    }
  }

  private mergeTriPrime(): Hex {
    const anchor = this.requireHex(TRI_PRIME_COORD);
    const merged = TRI_PRIME_CELLS.map((coord) => this.requireHex(coord));
    const mergedSet = new Set(merged);

    const outer = new Set<Hex>();
    for (const cell of merged) {
      for (const neighbor of cell.neighbors) {
        if (!mergedSet.has(neighbor)) {
          outer.add(neighbor);
        }
      }
    }

    for (const cell of merged) {
      for (const neighbor of cell.neighbors) {
        neighbor.removeNeighbor(cell);
        cell.removeNeighbor(neighbor);
      }
      if (cell !== anchor) {
        this.grid[cell.x][cell.y] = null;
      }
    }

    outer.forEach((neighbor) => {
      neighbor.addNeighbor(anchor);
      anchor.addNeighbor(neighbor);
    });

    anchor.setLevel(TRI_PRIME_LEVEL);
    return anchor;
  }

  private buildSectors(layout: BoardLayout): void {
    const byId = new Map<number, SectorPlacement>();
    for (const placement of layout.sectors) {
      if (placement.id === CENTRAL_SECTOR_ID || byId.has(placement.id)) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_POSITION,
          'Layout repeats a sector or places the central sector',
          { sectorId: placement.id }
        );
      }
      byId.set(placement.id, placement);
    }

    for (let id = 0; id < SECTOR_COUNT; id++) {
      const sector = new Sector(id, id === CENTRAL_SECTOR_ID);
      if (sector.isCentral) {
        this.attach(sector, this.triPrime);
      } else {
        const placement = byId.get(id);
        if (!placement) {
          throw new BoardConstraintViolation(
            EngineErrorCode.BOARD_INVALID_POSITION,
            'Layout is missing a sector',
            { sectorId: id }
          );
        }
        for (const system of placement.systems) {
          const hex = this.requireHex(system);
          if (hex.isSystem || system.level < 1 || system.level > 2) {
            throw new BoardConstraintViolation(
              EngineErrorCode.BOARD_INVALID_POSITION,
              'Invalid system placement',
              { sectorId: id, system }
            );
          }
          hex.setLevel(system.level);
          this.attach(sector, hex);
        }
      }
      this.sectorList.push(sector);
    }
  }

  private attach(sector: Sector, hex: Hex): void {
    sector.addSystemHex(hex);
    this.sectorByHex.set(hex, sector);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get layout(): BoardLayout {
    return {
      sectors: this.placements.sectors.map((sector) => ({
        id: sector.id,
        systems: sector.systems.map((system) => ({ ...system })),
      })),
    };
  }

  /** Every hex, column by column. Absorbed Tri-Prime cells are skipped. */
  get hexes(): Hex[] {
    const result: Hex[] = [];
    for (const column of this.grid) {
      for (const hex of column) {
        if (hex) {
          result.push(hex);
        }
      }
    }
    return result;
  }

  hexAt(coord: HexCoord): Hex | undefined {
    if (!isOnGrid(coord)) {
      return undefined;
    }
    return this.grid[coord.x][coord.y] ?? undefined;
  }

  requireHex(coord: HexCoord): Hex {
    if (!isOnGrid(coord)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        'Coordinates are outside the board',
        { x: coord.x, y: coord.y }
      );
    }
    const hex = this.grid[coord.x][coord.y];
    if (!hex) {
      throw entityNotFound('hex', { x: coord.x, y: coord.y }, 'Board');
    }
    return hex;
  }

  get sectors(): readonly Sector[] {
    return this.sectorList;
  }

  sector(id: number): Sector {
    const sector = this.sectorList[id];
    if (!sector) {
      throw entityNotFound('sector', { sectorId: id }, 'Board');
    }
    return sector;
  }

  get centralSector(): Sector {
    return this.sector(CENTRAL_SECTOR_ID);
  }

  /** Sector owning a system hex; undefined for empty hexes. */
  sectorOf(hex: Hex): Sector | undefined {
    return this.sectorByHex.get(hex);
  }

  /** All systems, sector by sector. */
  get systems(): Hex[] {
    return this.sectorList.flatMap((sector) => [...sector.systemHexes]);
  }

  systemsControlledBy(player: Player): Hex[] {
    return this.systems.filter((hex) => hex.isControlledBy(player));
  }

  /** Systems that are empty or held by someone else. */
  systemsNotControlledBy(player: Player): Hex[] {
    return this.systems.filter((hex) => !hex.isControlledBy(player));
  }

  hexesOccupiedBy(player: Player): Hex[] {
    return this.hexes.filter((hex) => hex.isControlledBy(player));
  }

  // ---------------------------------------------------------------------------
  // Round bookkeeping
  // ---------------------------------------------------------------------------

  /** Applies the capacity rule to every hex; returns the ships sent home. */
  sweepOverCapacity(): Ship[] {
    return this.hexes.flatMap((hex) => hex.sweepOverCapacity());
  }

  resetSectorsScored(): void {
    this.sectorList.forEach((sector) => sector.resetScored());
  }

  onHexUpdated(listener: HexUpdateListener): () => void {
    const unsubscribers = this.hexes.map((hex) => hex.onUpdate(listener));
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }
}
