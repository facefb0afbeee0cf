import type { Cell } from "../grid/GridMap";

export enum SearchStatus {
  IDLE,
  PENDING,
  FOUND,
  NOT_FOUND,
}

export interface PathResult {
  found: boolean;
  /** Start to end inclusive; empty when no path exists. */
  path: Cell[];
}

/**
 * Receives search progress. Exploration is reported for every cell except
 * the start and the end, at most once per run.
 */
export interface SearchListener {
  onExplored?(cell: Cell): void;
  onComplete?(result: PathResult): void;
}

/** Start and end as chosen by the user; either may be unset. */
export interface CellSelection {
  startCell: Cell | null;
  endCell: Cell | null;
}

export interface SearchConfig {
  /** Log a summary of every finished run. */
  debug?: boolean;
  /** Stamp value that triggers a visited-buffer clear; for testing overflow. */
  maxStamp?: number;
}

export enum SearchEventType {
  Explored,
  Complete,
}

export type SearchEvent =
  | { type: SearchEventType.Explored; cell: Cell }
  | { type: SearchEventType.Complete; result: PathResult };
