// A* over the 4-neighborhood with unit edge cost and a Manhattan heuristic,
// which is admissible and consistent here, so the first time the goal is
// popped its path is optimal.

import { manhattan, toIndex } from "../../grid/GridMap";
import { DIRECTION_COUNT, DX, DY, GridSearch } from "../GridSearch";
import { NO_PARENT, UNKNOWN_SCORE } from "../SearchBuffers";
import { SearchStatus } from "../types";

/**
 * Open set is an indexed min-heap keyed by fScore. Equal fScores prefer the
 * node nearer the goal.
 *
 * One step pops one node and relaxes its neighbors. Score, parent and heap
 * position tables are reset for the whole grid at the start of every run;
 * the finalized set uses the shared generation stamp.
 */
export class AStar extends GridSearch {
  readonly name = "A*";

  private stamp = 0;
  private goalX = 0;
  private goalY = 0;

  private heuristic(node: number): number {
    const width = this.width;
    return manhattan(node % width, (node / width) | 0, this.goalX, this.goalY);
  }

  protected compareNodes(a: number, b: number): number {
    const fScore = this.buffers.fScore;
    if (fScore[a] !== fScore[b]) {
      return fScore[a] - fScore[b];
    }
    return this.heuristic(a) - this.heuristic(b);
  }

  protected initialize(): void {
    const { gScore, fScore, parent, heap } = this.buffers;
    const start = this.startIndex;

    gScore.fill(UNKNOWN_SCORE);
    fScore.fill(UNKNOWN_SCORE);
    parent.fill(NO_PARENT);
    heap.clear();
    this.stamp = this.buffers.nextStamp();

    this.goalX = this.endIndex % this.width;
    this.goalY = (this.endIndex / this.width) | 0;

    gScore[start] = 0;
    fScore[start] = this.heuristic(start);
    heap.push(start);
  }

  protected advance(): SearchStatus {
    const { visitStamp, gScore, fScore, parent, heap } = this.buffers;
    const stamp = this.stamp;

    if (heap.isEmpty()) {
      return SearchStatus.NOT_FOUND;
    }

    const current = heap.popMin();
    if (visitStamp[current] === stamp) {
      return SearchStatus.PENDING;
    }
    visitStamp[current] = stamp;

    if (current === this.endIndex) {
      return SearchStatus.FOUND;
    }

    const width = this.width;
    const height = this.height;
    const cx = current % width;
    const cy = (current / width) | 0;

    if (current !== this.startIndex) {
      this.explore(cx, cy);
    }

    const tentativeG = gScore[current] + 1;

    for (let dir = 0; dir < DIRECTION_COUNT; dir++) {
      const nx = cx + DX[dir];
      const ny = cy + DY[dir];

      if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
      if (this.grid.isBlocked(nx, ny)) continue;

      const neighbor = toIndex(nx, ny, width);
      if (visitStamp[neighbor] === stamp) continue;

      if (tentativeG < gScore[neighbor]) {
        parent[neighbor] = current;
        gScore[neighbor] = tentativeG;
        fScore[neighbor] =
          tentativeG + manhattan(nx, ny, this.goalX, this.goalY);

        if (heap.contains(neighbor)) {
          heap.decreaseKey(neighbor);
        } else {
          heap.push(neighbor);
        }
      }
    }

    return SearchStatus.PENDING;
  }
}
