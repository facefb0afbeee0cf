import type { Cell, CellRef, GridMap } from "./GridMap";
import { fromIndex, inGridBounds, toIndex } from "./GridMap";

export enum CellState {
  Free = 0,
  Blocked = 1,
}

const BLOCKED_CHAR = "#";

/**
 * Obstacle grid backed by a single byte per cell.
 *
 * Cells are addressed either by (x, y) or by a dense CellRef. Obstacles may
 * be edited between searches but not while one is running.
 */
export class ObstacleGrid implements GridMap {
  private readonly cells: Uint8Array;

  constructor(
    private readonly _width: number,
    private readonly _height: number,
  ) {
    if (!Number.isInteger(_width) || !Number.isInteger(_height)) {
      throw new Error(`Grid dimensions must be integers: ${_width}x${_height}`);
    }
    if (_width <= 0 || _height <= 0) {
      throw new Error(`Grid dimensions must be positive: ${_width}x${_height}`);
    }
    this.cells = new Uint8Array(_width * _height);
  }

  /**
   * Parse an ASCII grid: `#` is an obstacle, any other character is free.
   */
  static fromRows(rows: string[]): ObstacleGrid {
    if (rows.length === 0 || rows[0].length === 0) {
      throw new Error("Grid rows must not be empty");
    }

    const width = rows[0].length;
    const grid = new ObstacleGrid(width, rows.length);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(
          `Row ${y} has length ${row.length}, expected ${width}`,
        );
      }
      for (let x = 0; x < width; x++) {
        if (row[x] === BLOCKED_CHAR) {
          grid.setBlocked(x, y, true);
        }
      }
    });

    return grid;
  }

  width(): number {
    return this._width;
  }

  height(): number {
    return this._height;
  }

  numCells(): number {
    return this.cells.length;
  }

  inBounds(x: number, y: number): boolean {
    return inGridBounds(this, x, y);
  }

  isBlocked(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return true;
    return this.cells[toIndex(x, y, this._width)] === CellState.Blocked;
  }

  state(x: number, y: number): CellState {
    return this.isBlocked(x, y) ? CellState.Blocked : CellState.Free;
  }

  setBlocked(x: number, y: number, blocked: boolean): void {
    if (!this.inBounds(x, y)) return;
    this.cells[toIndex(x, y, this._width)] = blocked
      ? CellState.Blocked
      : CellState.Free;
  }

  /** Flip a cell between free and blocked; returns the new blocked state. */
  toggleBlocked(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return false;
    const blocked = !this.isBlocked(x, y);
    this.setBlocked(x, y, blocked);
    return blocked;
  }

  clear(): void {
    this.cells.fill(CellState.Free);
  }

  ref(x: number, y: number): CellRef {
    if (!this.inBounds(x, y)) {
      throw new Error(`Cell (${x}, ${y}) is outside ${this._width}x${this._height}`);
    }
    return toIndex(x, y, this._width);
  }

  x(ref: CellRef): number {
    return ref % this._width;
  }

  y(ref: CellRef): number {
    return (ref / this._width) | 0;
  }

  cell(ref: CellRef): Cell {
    return fromIndex(ref, this._width);
  }

  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this._height; y++) {
      let row = "";
      for (let x = 0; x < this._width; x++) {
        row += this.isBlocked(x, y) ? BLOCKED_CHAR : ".";
      }
      rows.push(row);
    }
    return rows;
  }
}
