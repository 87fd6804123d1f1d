import { BUTTON_WIDTH, BUTTON_HEIGHT, BUTTON_BOTTOM_MARGIN } from "../constants";
import type { SimulationConfig } from "../config";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Pixel geometry shared by the renderer and the input translator. */
export interface BoardLayout {
  width: number;
  height: number;
  cols: number;
  rows: number;
  /** Integer cell size; the drawn grid may leave a margin at the right/bottom. */
  cellWidth: number;
  cellHeight: number;
  /** Pixel extent actually covered by cells. */
  gridWidth: number;
  gridHeight: number;
  button: Rect;
}

export function computeLayout(
  config: Pick<SimulationConfig, "width" | "height" | "cols" | "rows">,
): BoardLayout {
  const { width, height, cols, rows } = config;
  const cellWidth = Math.floor(width / cols);
  const cellHeight = Math.floor(height / rows);
  return {
    width,
    height,
    cols,
    rows,
    cellWidth,
    cellHeight,
    gridWidth: cellWidth * cols,
    gridHeight: cellHeight * rows,
    button: {
      x: Math.floor((width - BUTTON_WIDTH) / 2),
      y: height - BUTTON_HEIGHT - BUTTON_BOTTOM_MARGIN,
      width: BUTTON_WIDTH,
      height: BUTTON_HEIGHT,
    },
  };
}

export function containsPoint(rect: Rect, px: number, py: number): boolean {
  return px >= rect.x && px < rect.x + rect.width && py >= rect.y && py < rect.y + rect.height;
}

export function isInsideButton(layout: BoardLayout, px: number, py: number): boolean {
  return containsPoint(layout.button, px, py);
}

/** Cell under a pixel position, or null when the position is outside the drawn grid. */
export function cellAtPixel(layout: BoardLayout, px: number, py: number): { x: number; y: number } | null {
  if (px < 0 || py < 0 || px >= layout.gridWidth || py >= layout.gridHeight) return null;
  return {
    x: Math.floor(px / layout.cellWidth),
    y: Math.floor(py / layout.cellHeight),
  };
}
