// Dense cell index: y * width + x
export type CellRef = number;

export interface Cell {
  x: number;
  y: number;
}

/**
 * Read-only view of an obstacle grid. This is everything a search engine
 * needs from the grid owner; it must not change while a run is in progress.
 */
export interface GridMap {
  width(): number;
  height(): number;
  /** Out-of-bounds coordinates report as blocked. */
  isBlocked(x: number, y: number): boolean;
}

export function toIndex(x: number, y: number, width: number): CellRef {
  return y * width + x;
}

export function fromIndex(index: CellRef, width: number): Cell {
  return { x: index % width, y: (index / width) | 0 };
}

export function manhattan(ax: number, ay: number, bx: number, by: number) {
  return Math.abs(ax - bx) + Math.abs(ay - by);
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function inGridBounds(grid: GridMap, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    y >= 0 &&
    x < grid.width() &&
    y < grid.height()
  );
}
