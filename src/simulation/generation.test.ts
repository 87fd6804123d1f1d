import { LifeGrid, createRandomGrid } from "./grid";
import { computeNext, computeGenerations, countLiveNeighbors } from "./generation";
import { createRNG } from "./rng";

describe("countLiveNeighbors", () => {
  it("counts the 8 surrounding cells but not the cell itself", () => {
    const grid = LifeGrid.fromLiveCells(5, 5, [
      [1, 1], [2, 1], [3, 1],
      [1, 2], [2, 2], [3, 2],
      [1, 3], [2, 3], [3, 3],
    ]);
    expect(countLiveNeighbors(grid, 2, 2)).toBe(8);
    expect(countLiveNeighbors(grid, 1, 1)).toBe(3);
  });

  it("wraps: (0, 0) sees a live cell at (cols - 1, rows - 1)", () => {
    const grid = LifeGrid.fromLiveCells(6, 4, [[5, 3]]);
    expect(countLiveNeighbors(grid, 0, 0)).toBe(1);
  });

  it("wraps horizontally and vertically independently", () => {
    const grid = LifeGrid.fromLiveCells(6, 4, [[5, 0], [0, 3]]);
    expect(countLiveNeighbors(grid, 0, 0)).toBe(2);
  });
});

describe("computeNext", () => {
  it("keeps an all-dead grid dead", () => {
    const next = computeNext(new LifeGrid(8, 6));
    expect(next.population()).toBe(0);
  });

  it("kills an isolated live cell", () => {
    const next = computeNext(LifeGrid.fromLiveCells(5, 5, [[2, 2]]));
    expect(next.population()).toBe(0);
  });

  it("leaves a 2x2 block unchanged", () => {
    const block = LifeGrid.fromLiveCells(6, 6, [[2, 2], [3, 2], [2, 3], [3, 3]]);
    expect(computeNext(block).equals(block)).toBe(true);
  });

  it("turns a vertical blinker horizontal and back", () => {
    const vertical = LifeGrid.fromLiveCells(5, 5, [[2, 1], [2, 2], [2, 3]]);
    const next = computeNext(vertical);
    expect(next.liveCells()).toEqual([[1, 2], [2, 2], [3, 2]]);
    expect(computeNext(next).equals(vertical)).toBe(true);
  });

  it("fills a 3x3 torus from a blinker, since every cell neighbors all others", () => {
    const grid = LifeGrid.fromLiveCells(3, 3, [[1, 0], [1, 1], [1, 2]]);
    // Live cells see 2 neighbors and survive; dead cells see 3 and are born
    expect(computeNext(grid).population()).toBe(9);
  });

  it("kills overcrowded cells", () => {
    const plus = LifeGrid.fromLiveCells(5, 5, [[2, 1], [1, 2], [2, 2], [3, 2], [2, 3]]);
    const next = computeNext(plus);
    // Center has 4 neighbors
    expect(next.get(2, 2)).toBe(false);
  });

  it("does not modify its input", () => {
    const grid = LifeGrid.fromLiveCells(5, 5, [[2, 1], [2, 2], [2, 3]]);
    const before = grid.clone();
    const next = computeNext(grid);
    expect(next).not.toBe(grid);
    expect(grid.equals(before)).toBe(true);
  });

  it("is deterministic", () => {
    const grid = createRandomGrid(30, 20, 0.35, createRNG(9));
    expect(computeNext(grid).equals(computeNext(grid))).toBe(true);
  });

  it("moves a glider one cell diagonally every 4 generations across the wrap", () => {
    const glider = LifeGrid.fromLiveCells(8, 8, [[1, 0], [2, 1], [0, 2], [1, 2], [2, 2]]);
    const moved = computeGenerations(glider, 4);
    expect(moved.liveCells()).toEqual([[2, 1], [3, 2], [1, 3], [2, 3], [3, 3]]);
    // 8 diagonal moves bring it all the way round the torus
    expect(computeGenerations(glider, 32).equals(glider)).toBe(true);
  });
});

describe("computeGenerations", () => {
  it("returns an equal copy for zero generations", () => {
    const grid = LifeGrid.fromLiveCells(4, 4, [[1, 1]]);
    const result = computeGenerations(grid, 0);
    expect(result).not.toBe(grid);
    expect(result.equals(grid)).toBe(true);
  });
});
