/**
 * Read-only view of a Life grid.
 * Used by rendering and persistence code that reads cells without modifying them.
 */
export interface IGrid {
  readonly cols: number;
  readonly rows: number;
  /** Row-major cell values, 0 = dead, 1 = live. Length is always cols * rows. */
  readonly cells: Uint8Array;
}
