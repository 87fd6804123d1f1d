import { Application, Container, Graphics, Text } from "pixi.js";
import type { IGrid } from "../types/grid-types";
import type { BoardLayout } from "./layout";
import type { Renderer, RendererOptions, RendererMetrics } from "./renderer-interface";
import {
  BACKGROUND_COLOR, GRID_LINE_COLOR, LIVE_CELL_COLOR, BUTTON_COLOR, TEXT_COLOR,
  BUTTON_LABEL, FONT_SIZE, INSTRUCTIONS_TEXT, INSTRUCTION_LINE_HEIGHT,
} from "../constants";

function drawGridLines(g: Graphics, layout: BoardLayout): void {
  g.clear();
  for (let c = 0; c <= layout.cols; c++) {
    const x = c * layout.cellWidth;
    g.moveTo(x, 0).lineTo(x, layout.gridHeight);
  }
  for (let r = 0; r <= layout.rows; r++) {
    const y = r * layout.cellHeight;
    g.moveTo(0, y).lineTo(layout.gridWidth, y);
  }
  g.stroke({ width: 1, color: GRID_LINE_COLOR });
}

export async function createLifeRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: BACKGROUND_COLOR });
  app.ticker.stop();

  const boardContainer = new Container();
  const instructionsContainer = new Container();
  app.stage.addChild(boardContainer, instructionsContainer);

  const gridLines = new Graphics();
  const liveCells = new Graphics();
  const button = new Graphics();
  const buttonLabel = new Text({ text: BUTTON_LABEL, style: { fontSize: FONT_SIZE, fill: TEXT_COLOR } });
  buttonLabel.anchor.set(0.5);
  const statusLine = new Text({ text: "", style: { fontSize: FONT_SIZE * 0.75, fill: TEXT_COLOR } });
  boardContainer.addChild(gridLines, liveCells, button, buttonLabel, statusLine);

  const instructionLines = INSTRUCTIONS_TEXT.map(line => {
    const t = new Text({ text: line, style: { fontSize: FONT_SIZE, fill: TEXT_COLOR } });
    t.anchor.set(0.5);
    instructionsContainer.addChild(t);
    return t;
  });

  // Grid lines and button only change with layout
  let lastLayout: BoardLayout | null = null;

  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function layoutStatic(layout: BoardLayout): void {
    drawGridLines(gridLines, layout);

    const { button: rect } = layout;
    button.clear();
    button.rect(rect.x, rect.y, rect.width, rect.height).fill({ color: BUTTON_COLOR });
    buttonLabel.position.set(rect.x + rect.width / 2, rect.y + rect.height / 2);
    statusLine.position.set(8, rect.y + rect.height / 2 - FONT_SIZE / 2);

    instructionLines.forEach((t, i) => {
      t.position.set(layout.width / 2, layout.height / 2 + (i - instructionLines.length / 2) * INSTRUCTION_LINE_HEIGHT);
    });
    lastLayout = layout;
  }

  function update(grid: IGrid, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const { layout } = opts;
    if (layout !== lastLayout) layoutStatic(layout);

    boardContainer.visible = !opts.showingInstructions;
    instructionsContainer.visible = opts.showingInstructions;

    let population = 0;
    liveCells.clear();
    for (let y = 0; y < grid.rows; y++) {
      for (let x = 0; x < grid.cols; x++) {
        if (!grid.cells[y * grid.cols + x]) continue;
        population++;
        liveCells.rect(x * layout.cellWidth, y * layout.cellHeight, layout.cellWidth, layout.cellHeight);
      }
    }
    if (population > 0) liveCells.fill({ color: LIVE_CELL_COLOR });

    const parts = [`Generation ${opts.generation}`, `Population ${population}`];
    if (opts.paused) parts.push("Paused");
    if (opts.status) parts.push(opts.status);
    statusLine.text = parts.join(" | ");

    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return { fps: 0, sceneUpdateTimeMs, population };
  }

  return {
    canvas: app.canvas as unknown as HTMLCanvasElement,
    update,
    destroy() {
      app.destroy();
    },
  };
}
