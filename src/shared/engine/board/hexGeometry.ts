import { BoardConstraintViolation, EngineErrorCode } from '../errors';
import type { HexCoord } from '../types';

/**
 * Offset-column hex geometry. Columns alternate between six rows (even x)
 * and five rows (odd x); odd columns sit half a hex lower than even ones.
 */

export const GRID_COLUMNS = 9;

export function rowsInColumn(x: number): number {
  return 5 + ((x & 1) ^ 1);
}

export function isOnGrid(coord: HexCoord): boolean {
  return (
    Number.isInteger(coord.x) &&
    Number.isInteger(coord.y) &&
    coord.x >= 0 &&
    coord.x < GRID_COLUMNS &&
    coord.y >= 0 &&
    coord.y < rowsInColumn(coord.x)
  );
}

/**
 * Direction deltas indexed 0..5. The same table drives neighbour discovery and
 * `neighborDirection`, so a direction index always maps back to the same delta.
 */
const EVEN_COLUMN_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [1, -1],
  [0, -1],
  [-1, -1],
  [-1, 0],
  [0, 1],
  [1, 0],
];

const ODD_COLUMN_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [0, -1],
  [-1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
];

function deltasFor(x: number): ReadonlyArray<readonly [number, number]> {
  return (x & 1) === 0 ? EVEN_COLUMN_DELTAS : ODD_COLUMN_DELTAS;
}

/** Every on-grid coordinate adjacent to `coord`, in direction order. */
export function gridNeighbors(coord: HexCoord): HexCoord[] {
  return deltasFor(coord.x)
    .map(([dx, dy]) => ({ x: coord.x + dx, y: coord.y + dy }))
    .filter(isOnGrid);
}

/**
 * Direction index (0..5) from `from` to `to`, or -1 when they are not adjacent.
 */
export function neighborDirection(from: HexCoord, to: HexCoord): number {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  return deltasFor(from.x).findIndex(([ddx, ddy]) => ddx === dx && ddy === dy);
}

/** Same as `neighborDirection` but throws for non-adjacent hexes. */
export function requireNeighborDirection(from: HexCoord, to: HexCoord): number {
  const direction = neighborDirection(from, to);
  if (direction < 0) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_NOT_NEIGHBORS,
      'Hexes are not neighbours',
      { from, to }
    );
  }
  return direction;
}
