import type { IGrid } from "../types/grid-types";
import type { BoardLayout } from "./layout";

export interface RendererOptions {
  layout: BoardLayout;
  showingInstructions: boolean;
  paused: boolean;
  generation: number;
  status: string | null;
}

export interface RendererMetrics {
  fps: number;
  /** EMA-smoothed time spent rebuilding the scene, in ms. */
  sceneUpdateTimeMs: number;
  population: number;
}

export interface Renderer {
  update(grid: IGrid, opts: RendererOptions): RendererMetrics;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
