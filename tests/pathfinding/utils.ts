import { readdirSync, readFileSync } from "fs";
import { basename, dirname, join } from "path";
import { fileURLToPath } from "url";
import type { Cell } from "../../src/core/grid/GridMap";
import { ObstacleGrid } from "../../src/core/grid/ObstacleGrid";
import { BreadthFirstSearch } from "../../src/core/pathfinding/algorithms/BreadthFirstSearch";
import { AStar } from "../../src/core/pathfinding/algorithms/AStar";
import type { GridSearch } from "../../src/core/pathfinding/GridSearch";
import type { SearchListener } from "../../src/core/pathfinding/types";
import { PseudoRandom } from "../util/PseudoRandom";

export const DEFAULT_ITERATIONS = 100;

const scenariosDir = join(
  dirname(fileURLToPath(import.meta.url)),
  "scenarios",
);

export type Scenario = {
  name: string;
  grid: ObstacleGrid;
  start: Cell;
  end: Cell;
};

export type BenchmarkResult = {
  scenario: string;
  pathLength: number | null;
  explored: number;
  executionTime: number | null;
};

export type BenchmarkSummary = {
  totalScenarios: number;
  successfulScenarios: number;
  totalDistance: number;
  totalExplored: number;
  totalTime: number;
  avgTime: number;
};

export function getEngine(name: string): GridSearch {
  switch (name) {
    case "BFS":
      return new BreadthFirstSearch();
    case "AStar":
      return new AStar();
    default:
      throw new Error(`Unknown engine: ${name}`);
  }
}

/**
 * Parse an ASCII map: `#` is a wall, `S` the start, `E` the end, anything
 * else free. Blank lines and lines starting with `;` are ignored.
 */
export function parseScenario(name: string, text: string): Scenario {
  const rows = text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0 && !line.startsWith(";"));

  const grid = ObstacleGrid.fromRows(rows);
  let start: Cell | null = null;
  let end: Cell | null = null;

  for (let y = 0; y < rows.length; y++) {
    for (let x = 0; x < rows[y].length; x++) {
      if (rows[y][x] === "S") start = { x, y };
      if (rows[y][x] === "E") end = { x, y };
    }
  }

  if (start === null || end === null) {
    throw new Error(`Scenario ${name} needs both S and E`);
  }

  return { name, grid, start, end };
}

export function listScenarios(): string[] {
  return readdirSync(scenariosDir)
    .filter((file) => file.endsWith(".txt"))
    .map((file) => basename(file, ".txt"))
    .sort();
}

export function loadScenario(name: string): Scenario {
  return parseScenario(
    name,
    readFileSync(join(scenariosDir, `${name}.txt`), "utf8"),
  );
}

/**
 * Random obstacle map from corner to corner. Obstacles are re-rolled until
 * BFS confirms a path exists.
 */
export function randomScenario(
  width: number,
  height: number,
  density: number,
  seed: number,
  maxAttempts: number = 100,
): Scenario {
  const random = new PseudoRandom(seed);
  const start = { x: 0, y: 0 };
  const end = { x: width - 1, y: height - 1 };
  const grid = new ObstacleGrid(width, height);
  const bfs = new BreadthFirstSearch();

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    grid.clear();
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (random.chance(density)) grid.setBlocked(x, y, true);
      }
    }
    grid.setBlocked(start.x, start.y, false);
    grid.setBlocked(end.x, end.y, false);

    if (bfs.findPath(grid, start, end).found) {
      return {
        name: `random-${width}x${height}-${seed}`,
        grid,
        start,
        end,
      };
    }
  }

  throw new Error(
    `No connected ${width}x${height} map at density ${density} after ${maxAttempts} attempts`,
  );
}

export function getScenario(name: string): Scenario {
  // random:<width>x<height>:<density>:<seed>
  const match = /^random:(\d+)x(\d+):([\d.]+):(\d+)$/.exec(name);
  if (match) {
    return randomScenario(
      Number(match[1]),
      Number(match[2]),
      Number(match[3]),
      Number(match[4]),
    );
  }
  return loadScenario(name);
}

class ExploredCounter implements SearchListener {
  count = 0;

  onExplored(): void {
    this.count++;
  }
}

export function measureRun(
  engine: GridSearch,
  scenario: Scenario,
): { pathLength: number | null; explored: number } {
  const counter = new ExploredCounter();
  const result = engine.findPath(
    scenario.grid,
    scenario.start,
    scenario.end,
    counter,
  );
  return {
    pathLength: result.found ? result.path.length : null,
    explored: counter.count,
  };
}

export function measureTime<T>(fn: () => T): { result: T; time: number } {
  const start = performance.now();
  const result = fn();
  const end = performance.now();
  return { result, time: end - start };
}

export function measureExecutionTime(
  engine: GridSearch,
  scenario: Scenario,
  executions: number = DEFAULT_ITERATIONS,
): number {
  const { time } = measureTime(() => {
    for (let i = 0; i < executions; i++) {
      engine.findPath(scenario.grid, scenario.start, scenario.end);
    }
  });

  return time / executions;
}

export function calculateStats(results: BenchmarkResult[]): BenchmarkSummary {
  let successfulScenarios = 0;
  let totalDistance = 0;
  let totalExplored = 0;
  let totalTime = 0;
  let timed = 0;

  for (const r of results) {
    totalExplored += r.explored;
    if (r.pathLength !== null) {
      successfulScenarios++;
      totalDistance += r.pathLength;
    }
    if (r.executionTime !== null) {
      timed++;
      totalTime += r.executionTime;
    }
  }

  return {
    totalScenarios: results.length,
    successfulScenarios,
    totalDistance,
    totalExplored,
    totalTime,
    avgTime: timed > 0 ? totalTime / timed : 0,
  };
}

export function printRow(columns: (string | number)[], widths: number[]): void {
  const formatted = columns.map((col, i) => {
    const str = typeof col === "number" ? col.toString() : col;
    return str.padEnd(widths[i]);
  });

  console.log(formatted.join(" "));
}

export function printSeparator(width: number = 80): void {
  console.log("-".repeat(width));
}

export function printHeader(title: string, width: number = 80): void {
  printSeparator(width);
  console.log(title);
  printSeparator(width);
  console.log("");
}
