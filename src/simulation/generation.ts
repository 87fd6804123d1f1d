import { LifeGrid } from "./grid";

/** Neighbor offsets: the 8 surrounding cells, excluding (0, 0). */
const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

/** Counts live cells among the 8 neighbors of (x, y), wrapping at the edges. */
export function countLiveNeighbors(grid: LifeGrid, x: number, y: number): number {
  let count = 0;
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    if (grid.getWrapped(x + dx, y + dy)) count++;
  }
  return count;
}

/**
 * Computes the next generation (B3/S23).
 *
 * Results are written to a freshly allocated grid, so every cell sees only
 * the previous generation. The input is never modified.
 */
export function computeNext(grid: LifeGrid): LifeGrid {
  const { cols, rows } = grid;
  const next = new LifeGrid(cols, rows);

  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      const i = y * cols + x;
      const n = countLiveNeighbors(grid, x, y);
      if (grid.cells[i]) {
        next.cells[i] = n === 2 || n === 3 ? 1 : 0;
      } else {
        next.cells[i] = n === 3 ? 1 : 0;
      }
    }
  }

  return next;
}

/** Applies `computeNext` `generations` times. */
export function computeGenerations(grid: LifeGrid, generations: number): LifeGrid {
  let current = grid;
  for (let i = 0; i < generations; i++) {
    current = computeNext(current);
  }
  return current === grid ? grid.clone() : current;
}
