import type { IGrid } from "../types/grid-types";
import { ConfigError, CorruptDataError, OutOfBoundsError } from "../errors";

export type CellCoord = readonly [x: number, y: number];

function wrap(v: number, n: number): number {
  return ((v % n) + n) % n;
}

/**
 * Fixed-size Life board. Cells are stored row-major, one byte per cell
 * (0 = dead, 1 = live), so cell (x, y) lives at index y * cols + x.
 *
 * Edges wrap (toroidal topology), but only `getWrapped` applies the wrap;
 * the other accessors reject coordinates outside the board.
 */
export class LifeGrid implements IGrid {
  readonly cols: number;
  readonly rows: number;
  readonly cells: Uint8Array;

  constructor(cols: number, rows: number, cells?: Uint8Array) {
    if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols <= 0 || rows <= 0) {
      throw new ConfigError(`Grid dimensions must be positive integers, got ${cols}x${rows}`);
    }
    if (cells && cells.length !== cols * rows) {
      throw new CorruptDataError(`Expected ${cols * rows} cells for a ${cols}x${rows} grid, got ${cells.length}`);
    }
    this.cols = cols;
    this.rows = rows;
    this.cells = cells ?? new Uint8Array(cols * rows);
  }

  /** Builds a grid with exactly the given cells alive. */
  static fromLiveCells(cols: number, rows: number, live: readonly CellCoord[]): LifeGrid {
    const grid = new LifeGrid(cols, rows);
    for (const [x, y] of live) {
      grid.set(x, y, true);
    }
    return grid;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.cols && y >= 0 && y < this.rows;
  }

  idx(x: number, y: number): number {
    if (!this.inBounds(x, y)) {
      throw new OutOfBoundsError(x, y, this.cols, this.rows);
    }
    return y * this.cols + x;
  }

  get(x: number, y: number): boolean {
    return this.cells[this.idx(x, y)] === 1;
  }

  /** Neighbor-counting read: coordinates wrap around both edges. */
  getWrapped(x: number, y: number): boolean {
    return this.cells[wrap(y, this.rows) * this.cols + wrap(x, this.cols)] === 1;
  }

  set(x: number, y: number, live: boolean): void {
    this.cells[this.idx(x, y)] = live ? 1 : 0;
  }

  /** Flips a single cell and returns its new value. */
  toggle(x: number, y: number): boolean {
    const i = this.idx(x, y);
    this.cells[i] = this.cells[i] ? 0 : 1;
    return this.cells[i] === 1;
  }

  population(): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      count += this.cells[i];
    }
    return count;
  }

  /** Live cell coordinates in row-major order. */
  liveCells(): CellCoord[] {
    const out: CellCoord[] = [];
    for (let y = 0; y < this.rows; y++) {
      for (let x = 0; x < this.cols; x++) {
        if (this.cells[y * this.cols + x]) out.push([x, y]);
      }
    }
    return out;
  }

  clone(): LifeGrid {
    return new LifeGrid(this.cols, this.rows, this.cells.slice());
  }

  equals(other: IGrid): boolean {
    if (other.cols !== this.cols || other.rows !== this.rows) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }
}

/**
 * Returns a grid where each cell is independently alive with probability
 * `liveProbability`. Pass a seeded `random` for reproducible boards.
 */
export function createRandomGrid(
  cols: number,
  rows: number,
  liveProbability: number,
  random: () => number = Math.random,
): LifeGrid {
  if (!(liveProbability >= 0 && liveProbability <= 1)) {
    throw new ConfigError(`Live probability must be within [0, 1], got ${liveProbability}`);
  }
  const grid = new LifeGrid(cols, rows);
  for (let i = 0; i < grid.cells.length; i++) {
    grid.cells[i] = random() < liveProbability ? 1 : 0;
  }
  return grid;
}
