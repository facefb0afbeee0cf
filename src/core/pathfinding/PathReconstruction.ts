import type { CellRef } from "../grid/GridMap";
import { InvariantViolationError } from "./errors";
import { NO_PARENT } from "./SearchBuffers";

/**
 * Walk parent links from goal back to start, returning indices start-to-end.
 * A chain that dead-ends or outgrows the grid means the parent table is
 * corrupt.
 */
export function reconstructPath(
  parent: Int32Array,
  startIndex: CellRef,
  goalIndex: CellRef,
  gridSize: number,
): CellRef[] {
  const path: CellRef[] = [];
  let current = goalIndex;

  while (current !== startIndex) {
    if (path.length >= gridSize) {
      throw new InvariantViolationError(
        `Parent chain from ${goalIndex} did not reach ${startIndex} within ${gridSize} steps`,
      );
    }

    path.push(current);
    current = parent[current];

    if (current === NO_PARENT) {
      throw new InvariantViolationError(
        `Parent chain from ${goalIndex} ended before reaching ${startIndex}`,
      );
    }
  }

  path.push(startIndex);
  path.reverse();
  return path;
}
