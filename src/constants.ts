// ── Window ──

/** Default canvas width in pixels. */
export const DEFAULT_WIDTH = 900;

/** Default canvas height in pixels. */
export const DEFAULT_HEIGHT = 600;

// ── Grid ──

/** Default number of columns in the grid. */
export const DEFAULT_COLS = 40;

/** Default number of rows in the grid. */
export const DEFAULT_ROWS = 30;

/** Default probability that a cell starts alive. */
export const DEFAULT_LIVE_PROBABILITY = 0.2;

// ── Simulation ──

/** Default time between automatic generations, in seconds. */
export const DEFAULT_TICK_INTERVAL_SECONDS = 0.8;

/** Default frame-rate cap for the render loop. */
export const DEFAULT_FPS = 10;

/** Default name under which the grid snapshot is stored. */
export const DEFAULT_SAVE_NAME = "saved_game_state.life";

// ── Controls ──

/** "Next Generation" button size in pixels. */
export const BUTTON_WIDTH = 200;
export const BUTTON_HEIGHT = 50;

/** Gap between the button and the bottom edge of the canvas. */
export const BUTTON_BOTTOM_MARGIN = 10;

export const BUTTON_LABEL = "Next Generation";

// ── Rendering ──

export const BACKGROUND_COLOR = 0xffffff;
export const GRID_LINE_COLOR = 0x808080;
export const LIVE_CELL_COLOR = 0x000000;
export const BUTTON_COLOR = 0x00ff00;
export const TEXT_COLOR = 0x000000;

/** Font size for button and instruction text, in pixels. */
export const FONT_SIZE = 24;

/** Vertical spacing between instruction lines, in pixels. */
export const INSTRUCTION_LINE_HEIGHT = 32;

export const INSTRUCTIONS_TEXT = [
  "Welcome to the Game of Life",
  "Instructions:",
  "- Click 'Next Generation' to advance one generation.",
  "- Click a cell to toggle it.",
  "- Press Space to pause or resume the simulation.",
  "- Press 's' to save the grid, 'l' to load it.",
  "- Press Enter to continue.",
];
