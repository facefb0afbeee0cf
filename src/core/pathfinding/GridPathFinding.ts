import type { Cell, GridMap } from "../grid/GridMap";
import { AStar } from "./algorithms/AStar";
import { BreadthFirstSearch } from "./algorithms/BreadthFirstSearch";
import type { GridSearch } from "./GridSearch";
import type {
  CellSelection,
  PathResult,
  SearchConfig,
  SearchListener,
} from "./types";

/**
 * Grid search engines. Keep the returned instance around to reuse its
 * buffers between runs; use one instance per concurrent run.
 */
export class GridPathFinding {
  static BreadthFirst(config?: SearchConfig): BreadthFirstSearch {
    return new BreadthFirstSearch(config);
  }

  static AStar(config?: SearchConfig): AStar {
    return new AStar(config);
  }
}

/**
 * One-off BFS run. Throws InvalidRequestError for unusable endpoints;
 * an unreachable end comes back as { found: false }.
 */
export function runBreadthFirst(
  grid: GridMap,
  start: Cell,
  end: Cell,
  listener?: SearchListener,
): PathResult {
  return GridPathFinding.BreadthFirst().findPath(grid, start, end, listener);
}

/** One-off A* run, same contract as runBreadthFirst. */
export function runAStar(
  grid: GridMap,
  start: Cell,
  end: Cell,
  listener?: SearchListener,
): PathResult {
  return GridPathFinding.AStar().findPath(grid, start, end, listener);
}

/** Search between the currently selected cells, which may be unset. */
export function runFromSelection(
  engine: GridSearch,
  grid: GridMap,
  selection: CellSelection,
  listener?: SearchListener,
): PathResult {
  return engine.findPath(
    grid,
    selection.startCell,
    selection.endCell,
    listener,
  );
}
