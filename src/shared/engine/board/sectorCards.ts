/**
 * Sector tiles, in tile-local coordinates. The first two systems of each card
 * are level 1, the third level 2.
 */
export type SectorCard = readonly [
  readonly [number, number],
  readonly [number, number],
  readonly [number, number],
];

/** Cards for the top row (sectors 0-2) and, mirrored, the bottom row (6-8). */
export const EDGE_SECTOR_CARDS: readonly SectorCard[] = [
  [[1, 0], [2, 1], [0, 0]],
  [[0, 0], [1, 0], [2, 0]],
  [[0, 0], [0, 1], [2, 1]],
  [[0, 0], [0, 1], [1, 0]],
  [[0, 0], [2, 0], [1, 0]],
  [[2, 0], [2, 1], [1, 0]],
];

/** Cards for the sectors beside the Tri-Prime (3 and 5). */
export const SIDE_SECTOR_CARDS: readonly SectorCard[] = [
  [[1, 0], [2, 0], [0, 0]],
  [[0, 0], [2, 0], [1, 1]],
];

export const EDGE_SECTOR_IDS: readonly number[] = [0, 1, 2, 6, 7, 8];
export const SIDE_SECTOR_IDS: readonly number[] = [3, 5];
export const CENTRAL_SECTOR_ID = 4;
export const SECTOR_COUNT = 9;

export const TRI_PRIME_COORD = { x: 4, y: 2 } as const;

/** Grid cells absorbed into the Tri-Prime, anchor included. */
export const TRI_PRIME_CELLS: ReadonlyArray<{ x: number; y: number }> = [
  { x: 3, y: 2 },
  { x: 4, y: 2 },
  { x: 4, y: 3 },
  { x: 5, y: 2 },
];
