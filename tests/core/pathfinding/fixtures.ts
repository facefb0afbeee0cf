/**
 * Small test maps for pathfinding unit tests.
 *
 * Map encoding:
 *   . = free
 *   # = blocked
 *   S = start (free)
 *   E = end (free)
 */

import type { Cell } from "../../../src/core/grid/GridMap";
import { sameCell } from "../../../src/core/grid/GridMap";
import { ObstacleGrid } from "../../../src/core/grid/ObstacleGrid";
import type {
  PathResult,
  SearchListener,
} from "../../../src/core/pathfinding/types";

export type TestMap = {
  grid: ObstacleGrid;
  start: Cell;
  end: Cell;
};

export function mapFromRows(rows: string[]): TestMap {
  let start: Cell | null = null;
  let end: Cell | null = null;

  for (let y = 0; y < rows.length; y++) {
    for (let x = 0; x < rows[y].length; x++) {
      if (rows[y][x] === "S") start = { x, y };
      if (rows[y][x] === "E") end = { x, y };
    }
  }

  if (start === null || end === null) {
    throw new Error("Test map needs both S and E");
  }

  return { grid: ObstacleGrid.fromRows(rows), start, end };
}

export function emptyMap(width: number, height: number): ObstacleGrid {
  return new ObstacleGrid(width, height);
}

/** Listener that records every event in order. */
export class Recorder implements SearchListener {
  readonly explored: Cell[] = [];
  readonly results: PathResult[] = [];

  onExplored(cell: Cell): void {
    this.explored.push(cell);
  }

  onComplete(result: PathResult): void {
    this.results.push(result);
  }
}

export function key(cell: Cell): string {
  return `${cell.x},${cell.y}`;
}

/**
 * True when the path is a 4-connected walk from start to end with no
 * repeated cell that only crosses free cells.
 */
export function isValidWalk(
  grid: ObstacleGrid,
  path: Cell[],
  start: Cell,
  end: Cell,
): boolean {
  if (path.length === 0) return false;
  if (!sameCell(path[0], start)) return false;
  if (!sameCell(path[path.length - 1], end)) return false;

  const seen = new Set<string>();
  for (let i = 0; i < path.length; i++) {
    const cell = path[i];
    if (grid.isBlocked(cell.x, cell.y)) return false;
    if (seen.has(key(cell))) return false;
    seen.add(key(cell));

    if (i > 0) {
      const prev = path[i - 1];
      const step = Math.abs(cell.x - prev.x) + Math.abs(cell.y - prev.y);
      if (step !== 1) return false;
    }
  }
  return true;
}

/** Run `fn` and return what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
