import type { Cell, GridMap } from "../grid/GridMap";
import type { GridSearch } from "./GridSearch";
import { SearchEventType, SearchStatus } from "./types";
import type { PathResult, SearchEvent } from "./types";

/**
 * Drive a search one step at a time, yielding its events as they happen.
 *
 * Nothing runs until the first next(); an invalid request throws there,
 * before any event. Returning from the generator early (break, return())
 * cancels the run.
 *
 * Usage:
 *   for (const event of searchSteps(engine, grid, start, end)) {
 *     if (event.type === SearchEventType.Explored) paint(event.cell);
 *   }
 */
export function* searchSteps(
  engine: GridSearch,
  grid: GridMap,
  start: Cell | null | undefined,
  end: Cell | null | undefined,
): Generator<SearchEvent, PathResult, void> {
  const pending: SearchEvent[] = [];

  engine.begin(grid, start, end, {
    onExplored: (cell) => pending.push({ type: SearchEventType.Explored, cell }),
    onComplete: (result) =>
      pending.push({ type: SearchEventType.Complete, result }),
  });

  try {
    while (true) {
      for (const event of pending.splice(0)) {
        yield event;
      }
      if (engine.status() !== SearchStatus.PENDING) {
        return engine.result();
      }
      engine.step();
    }
  } finally {
    if (engine.status() === SearchStatus.PENDING) {
      engine.cancel();
    }
  }
}
