export {
  fromIndex,
  inGridBounds,
  manhattan,
  sameCell,
  toIndex,
} from "./core/grid/GridMap";
export type { Cell, CellRef, GridMap } from "./core/grid/GridMap";
export { CellState, ObstacleGrid } from "./core/grid/ObstacleGrid";
export { AStar } from "./core/pathfinding/algorithms/AStar";
export { BreadthFirstSearch } from "./core/pathfinding/algorithms/BreadthFirstSearch";
export {
  InvalidRequestError,
  InvalidRequestReason,
  InvariantViolationError,
} from "./core/pathfinding/errors";
export {
  GridPathFinding,
  runAStar,
  runBreadthFirst,
  runFromSelection,
} from "./core/pathfinding/GridPathFinding";
export { GridSearch, validateRequest } from "./core/pathfinding/GridSearch";
export { IndexedMinHeap } from "./core/pathfinding/IndexedMinHeap";
export type { HeapComparator } from "./core/pathfinding/IndexedMinHeap";
export { reconstructPath } from "./core/pathfinding/PathReconstruction";
export { SearchBuffers } from "./core/pathfinding/SearchBuffers";
export { searchSteps } from "./core/pathfinding/SearchStepper";
export { SearchEventType, SearchStatus } from "./core/pathfinding/types";
export type {
  CellSelection,
  PathResult,
  SearchConfig,
  SearchEvent,
  SearchListener,
} from "./core/pathfinding/types";
