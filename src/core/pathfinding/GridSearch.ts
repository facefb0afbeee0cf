import type { Cell, CellRef, GridMap } from "../grid/GridMap";
import { fromIndex, inGridBounds, toIndex } from "../grid/GridMap";
import { InvalidRequestError, InvalidRequestReason } from "./errors";
import { reconstructPath } from "./PathReconstruction";
import { SearchBuffers } from "./SearchBuffers";
import { SearchStatus } from "./types";
import type { PathResult, SearchConfig, SearchListener } from "./types";

// 4-neighborhood, expanded in this order: +x, -x, +y, -y
export const DIRECTION_COUNT = 4;
export const DX: readonly number[] = [1, -1, 0, 0];
export const DY: readonly number[] = [0, 0, 1, -1];

const NO_GRID: GridMap = {
  width: () => 0,
  height: () => 0,
  isBlocked: () => true,
};

export interface ValidatedRequest {
  startIndex: CellRef;
  endIndex: CellRef;
}

/**
 * Reject a request that cannot be searched: unset, out-of-bounds or blocked
 * endpoints, or a grid without cells.
 */
export function validateRequest(
  grid: GridMap,
  start: Cell | null | undefined,
  end: Cell | null | undefined,
): ValidatedRequest {
  const width = grid.width();
  const height = grid.height();

  if (
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new InvalidRequestError(
      InvalidRequestReason.EMPTY_GRID,
      `Grid has no cells (${width}x${height})`,
    );
  }

  if (!start || !end) {
    throw new InvalidRequestError(
      InvalidRequestReason.MISSING_ENDPOINT,
      start ? "End cell is not set" : "Start cell is not set",
    );
  }

  for (const cell of [start, end]) {
    if (!inGridBounds(grid, cell.x, cell.y)) {
      throw new InvalidRequestError(
        InvalidRequestReason.OUT_OF_BOUNDS,
        `Cell (${cell.x}, ${cell.y}) is outside ${width}x${height}`,
        cell,
      );
    }
    if (grid.isBlocked(cell.x, cell.y)) {
      throw new InvalidRequestError(
        InvalidRequestReason.BLOCKED,
        `Cell (${cell.x}, ${cell.y}) is blocked`,
        cell,
      );
    }
  }

  return {
    startIndex: toIndex(start.x, start.y, width),
    endIndex: toIndex(end.x, end.y, width),
  };
}

/**
 * Incremental grid search.
 *
 * A run is started with begin() and advanced with step(); each step is one
 * unit of exploration, after which the caller may pause, inspect, cancel or
 * continue. findPath() drives a run to completion in one call.
 *
 * An instance owns its buffers and reuses them run to run. It supports one
 * run at a time: begin() abandons any run still in progress.
 */
export abstract class GridSearch {
  abstract readonly name: string;

  protected readonly buffers: SearchBuffers;
  protected grid: GridMap = NO_GRID;
  protected width = 0;
  protected height = 0;
  protected startIndex: CellRef = -1;
  protected endIndex: CellRef = -1;

  private readonly debug: boolean;
  private listener: SearchListener | undefined;
  private state = SearchStatus.IDLE;
  private lastResult: PathResult | null = null;
  private exploredCount = 0;
  private startTime = 0;

  constructor(config?: SearchConfig) {
    this.debug = config?.debug ?? false;
    this.buffers = new SearchBuffers({
      compare: (a, b) => this.compareNodes(a, b),
      maxStamp: config?.maxStamp,
    });
  }

  /**
   * Set up the first step of a run; throws InvalidRequestError. The previous
   * run's result is discarded even when the request is rejected.
   */
  begin(
    grid: GridMap,
    start: Cell | null | undefined,
    end: Cell | null | undefined,
    listener?: SearchListener,
  ): void {
    this.cancel();
    this.lastResult = null;
    this.exploredCount = 0;

    const { startIndex, endIndex } = validateRequest(grid, start, end);

    this.grid = grid;
    this.width = grid.width();
    this.height = grid.height();
    this.startIndex = startIndex;
    this.endIndex = endIndex;
    this.listener = listener;
    this.startTime = performance.now();

    this.buffers.ensureCapacity(this.width * this.height);
    this.state = SearchStatus.PENDING;

    if (startIndex === endIndex) {
      this.finish(SearchStatus.FOUND);
      return;
    }

    this.initialize();
  }

  /** Perform one unit of work and report where the run stands. */
  step(): SearchStatus {
    if (this.state === SearchStatus.IDLE) {
      throw new Error(`${this.name}: no search in progress`);
    }
    if (this.state !== SearchStatus.PENDING) {
      return this.state;
    }

    const status = this.advance();
    if (status !== SearchStatus.PENDING) {
      this.finish(status);
    }
    return this.state;
  }

  findPath(
    grid: GridMap,
    start: Cell | null | undefined,
    end: Cell | null | undefined,
    listener?: SearchListener,
  ): PathResult {
    this.begin(grid, start, end, listener);
    while (this.step() === SearchStatus.PENDING) {
      // keep stepping
    }
    return this.result();
  }

  status(): SearchStatus {
    return this.state;
  }

  /** Cells reported as explored so far in the current or last run. */
  explored(): number {
    return this.exploredCount;
  }

  result(): PathResult {
    if (this.lastResult === null) {
      throw new Error(`${this.name}: search has not finished`);
    }
    return this.lastResult;
  }

  path(): Cell[] {
    if (this.state !== SearchStatus.FOUND || this.lastResult === null) {
      throw new Error(`${this.name}: no path available`);
    }
    return this.lastResult.path;
  }

  /**
   * Abandon the current run. Buffers are left stale; the next begin()
   * supersedes them.
   */
  cancel(): void {
    if (this.state === SearchStatus.PENDING && this.debug) {
      console.log(
        `[DEBUG] ${this.name}: cancelled after ${this.exploredCount} explored cells`,
      );
    }
    this.state = SearchStatus.IDLE;
    this.listener = undefined;
    this.grid = NO_GRID;
  }

  /** Seed the buffers for a run whose start and end differ. */
  protected abstract initialize(): void;

  /** One unit of exploration: PENDING, FOUND or NOT_FOUND. */
  protected abstract advance(): SearchStatus;

  /** Open-set ordering; only engines that use the heap need to override. */
  protected compareNodes(a: number, b: number): number {
    return this.buffers.fScore[a] - this.buffers.fScore[b];
  }

  protected explore(x: number, y: number): void {
    this.exploredCount++;
    this.listener?.onExplored?.({ x, y });
  }

  private finish(status: SearchStatus): void {
    const listener = this.listener;
    this.state = SearchStatus.IDLE;

    let result: PathResult;
    if (status === SearchStatus.FOUND) {
      const indices = reconstructPath(
        this.buffers.parent,
        this.startIndex,
        this.endIndex,
        this.width * this.height,
      );
      const width = this.width;
      result = {
        found: true,
        path: indices.map((index) => fromIndex(index, width)),
      };
    } else {
      result = { found: false, path: [] };
    }

    this.state = status;
    this.lastResult = result;
    this.listener = undefined;
    this.grid = NO_GRID;

    if (this.debug) {
      const elapsed = performance.now() - this.startTime;
      console.log(
        `[DEBUG] ${this.name}: ${SearchStatus[status]} explored=${this.exploredCount} path=${result.path.length} in ${elapsed.toFixed(2)}ms`,
      );
    }

    listener?.onComplete?.(result);
  }
}
