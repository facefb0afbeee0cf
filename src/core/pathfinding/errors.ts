import type { Cell } from "../grid/GridMap";

export enum InvalidRequestReason {
  MISSING_ENDPOINT = "missing-endpoint",
  OUT_OF_BOUNDS = "out-of-bounds",
  BLOCKED = "blocked",
  EMPTY_GRID = "empty-grid",
}

/**
 * The request was rejected before any cell was explored.
 */
export class InvalidRequestError extends Error {
  constructor(
    readonly reason: InvalidRequestReason,
    message: string,
    readonly cell: Cell | null = null,
  ) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/**
 * Search bookkeeping is inconsistent. Never expected in a correct build.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}
