import { IndexedMinHeap } from "./IndexedMinHeap";
import type { HeapComparator } from "./IndexedMinHeap";

export const NO_PARENT = -1;
export const UNKNOWN_SCORE = 0xffff_ffff;

// Largest value a Uint32Array stamp slot can hold
const DEFAULT_MAX_STAMP = 0xffff_ffff;

export interface SearchBuffersConfig {
  compare?: HeapComparator;
  maxStamp?: number;
}

/**
 * Run-scoped arrays shared by the grid searches, sized to the grid and kept
 * across runs. Nothing is reallocated until the grid size changes.
 *
 * Visited state uses a generation stamp: a cell is visited in the current
 * run iff visitStamp[cell] === stamp, so starting a run only bumps a counter.
 */
export class SearchBuffers {
  visitStamp = new Uint32Array(0);
  parent = new Int32Array(0);
  queue = new Int32Array(0);
  gScore = new Uint32Array(0);
  fScore = new Uint32Array(0);
  readonly heap: IndexedMinHeap;

  private stamp = 0;
  private readonly maxStamp: number;

  constructor(config?: SearchBuffersConfig) {
    this.heap = new IndexedMinHeap(
      0,
      config?.compare ?? ((a, b) => this.fScore[a] - this.fScore[b]),
    );
    this.maxStamp = config?.maxStamp ?? DEFAULT_MAX_STAMP;

    if (
      !Number.isInteger(this.maxStamp) ||
      this.maxStamp < 2 ||
      this.maxStamp > DEFAULT_MAX_STAMP
    ) {
      throw new Error(`Invalid maxStamp: ${this.maxStamp}`);
    }
  }

  capacity(): number {
    return this.visitStamp.length;
  }

  /**
   * Size every buffer to `size` cells. Returns true when the buffers were
   * reallocated, which also resets the stamp counter and the heap.
   */
  ensureCapacity(size: number): boolean {
    if (this.visitStamp.length === size) return false;

    this.visitStamp = new Uint32Array(size);
    this.parent = new Int32Array(size);
    this.queue = new Int32Array(size);
    this.gScore = new Uint32Array(size);
    this.fScore = new Uint32Array(size);
    this.heap.resize(size);
    this.stamp = 0;

    return true;
  }

  /** Stamp identifying the current run. */
  currentStamp(): number {
    return this.stamp;
  }

  nextStamp(): number {
    this.stamp++;
    if (this.stamp >= this.maxStamp) {
      // Wrapped: old stamps could collide with new ones
      this.visitStamp.fill(0);
      this.stamp = 1;
    }
    return this.stamp;
  }
}
