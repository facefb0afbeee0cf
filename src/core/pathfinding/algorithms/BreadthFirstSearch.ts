// Unweighted BFS over the 4-neighborhood. Shortest by hop count.

import { toIndex } from "../../grid/GridMap";
import { DIRECTION_COUNT, DX, DY, GridSearch } from "../GridSearch";
import { NO_PARENT } from "../SearchBuffers";
import { SearchStatus } from "../types";

/**
 * Stamp-based visited tracking and a typed-array FIFO with head/tail cursors.
 *
 * One step inspects one neighbor of the cell being expanded. The end cell is
 * accepted as soon as it is discovered, so its own neighbors are never
 * expanded. Discovered cells are reported in discovery order.
 */
export class BreadthFirstSearch extends GridSearch {
  readonly name = "BFS";

  private stamp = 0;
  private head = 0;
  private tail = 0;
  private current = -1;
  private currentX = 0;
  private currentY = 0;
  private direction = DIRECTION_COUNT;

  protected initialize(): void {
    const { visitStamp, parent, queue } = this.buffers;
    const stamp = this.buffers.nextStamp();
    const start = this.startIndex;

    this.stamp = stamp;
    this.head = 0;
    this.tail = 0;
    this.current = -1;
    this.direction = DIRECTION_COUNT;

    visitStamp[start] = stamp;
    parent[start] = NO_PARENT;
    queue[this.tail++] = start;
  }

  protected advance(): SearchStatus {
    const { visitStamp, parent, queue } = this.buffers;

    if (this.direction === DIRECTION_COUNT) {
      if (this.head === this.tail) {
        return SearchStatus.NOT_FOUND;
      }
      const node = queue[this.head++];
      this.current = node;
      this.currentX = node % this.width;
      this.currentY = (node / this.width) | 0;
      this.direction = 0;
    }

    const dir = this.direction++;
    const nx = this.currentX + DX[dir];
    const ny = this.currentY + DY[dir];

    if (nx < 0 || ny < 0 || nx >= this.width || ny >= this.height) {
      return SearchStatus.PENDING;
    }
    if (this.grid.isBlocked(nx, ny)) {
      return SearchStatus.PENDING;
    }

    const neighbor = toIndex(nx, ny, this.width);
    if (visitStamp[neighbor] === this.stamp) {
      return SearchStatus.PENDING;
    }

    visitStamp[neighbor] = this.stamp;
    parent[neighbor] = this.current;

    if (neighbor === this.endIndex) {
      return SearchStatus.FOUND;
    }

    queue[this.tail++] = neighbor;
    this.explore(nx, ny);
    return SearchStatus.PENDING;
  }
}
