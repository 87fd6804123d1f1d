import { LifeGrid, createRandomGrid } from "./grid";
import { computeNext } from "./generation";
import { SimulationClock } from "./simulation-clock";
import { createRNG } from "./rng";
import type { SimulationConfig } from "../config";
import { validateConfig } from "../config";
import type { SnapshotStore } from "../persistence/snapshot-store";
import { loadGrid, saveGrid } from "../persistence/snapshot-store";
import type { BoardLayout } from "../rendering/layout";
import { computeLayout } from "../rendering/layout";
import type { Command, KeyBindings, RawInputEvent } from "../input/input-translator";
import { DEFAULT_KEY_BINDINGS, translateEvent } from "../input/input-translator";
import { CorruptDataError, StorageError, isRecoverable } from "../errors";

/** What the renderer needs after a frame. */
export interface FrameState {
  grid: LifeGrid;
  paused: boolean;
  showingInstructions: boolean;
  generation: number;
  /** Latest user-facing message (save/load result), or null. */
  status: string | null;
  quit: boolean;
}

export interface SimulationControllerOptions {
  store: SnapshotStore;
  /** Random source for the initial board. Defaults to a seeded RNG when config.seed is set, else Math.random. */
  random?: () => number;
  keyBindings?: KeyBindings;
  /** Timestamp the clock starts from. */
  now?: number;
}

/**
 * Owns the grid, the clock and the input queue, and runs one frame at a time:
 * drain queued input in arrival order, apply the resulting commands, then
 * advance a generation if the clock says one is due.
 *
 * Starts on the instructions screen; nothing but "proceed" (or quit) gets
 * through until the user proceeds.
 */
export class SimulationController {
  readonly config: SimulationConfig;
  readonly layout: BoardLayout;
  readonly clock: SimulationClock;

  private _grid: LifeGrid;
  private _generation = 0;
  private _showingInstructions = true;
  private _status: string | null = null;
  private _quit = false;
  private readonly queue: RawInputEvent[] = [];
  private readonly store: SnapshotStore;
  private readonly keyBindings: KeyBindings;

  constructor(config: SimulationConfig, options: SimulationControllerOptions) {
    this.config = validateConfig(config);
    this.layout = computeLayout(config);
    this.clock = new SimulationClock(config.tickIntervalSeconds * 1000, options.now ?? 0);
    this.store = options.store;
    this.keyBindings = options.keyBindings ?? DEFAULT_KEY_BINDINGS;

    const random = options.random ??
      (config.seed !== undefined ? createRNG(config.seed) : Math.random);
    this._grid = createRandomGrid(config.cols, config.rows, config.liveProbability, random);
  }

  get grid(): LifeGrid {
    return this._grid;
  }

  get generation(): number {
    return this._generation;
  }

  get showingInstructions(): boolean {
    return this._showingInstructions;
  }

  get quit(): boolean {
    return this._quit;
  }

  enqueue(event: RawInputEvent): void {
    if (this._quit) return;
    this.queue.push(event);
  }

  /**
   * Runs one iteration of the main loop at timestamp `now` and returns the
   * state to render. After a quit this only reports the final state.
   */
  frame(now: number): FrameState {
    if (!this._quit) {
      this.drainInput(now);
    }

    if (!this._quit && !this._showingInstructions && this.clock.consumeTick(now)) {
      this.advance();
    }

    return this.snapshot();
  }

  snapshot(): FrameState {
    return {
      grid: this._grid,
      paused: this.clock.paused,
      showingInstructions: this._showingInstructions,
      generation: this._generation,
      status: this._status,
      quit: this._quit,
    };
  }

  private drainInput(now: number): void {
    try {
      for (const event of this.queue) {
        if (this._quit) break;
        const command = translateEvent(event, this.layout, this.keyBindings);
        if (command) this.apply(command, now);
      }
    } finally {
      // Anything queued behind a quit (or a failed command) is dropped
      this.queue.length = 0;
    }
  }

  /** Applies a single command. Exposed for callers that translate input themselves. */
  apply(command: Command, now: number): void {
    if (this._quit) return;

    if (command.type === "quit") {
      this._quit = true;
      return;
    }

    if (this._showingInstructions) {
      if (command.type === "proceed") {
        this._showingInstructions = false;
        this.clock.reset(now);
      }
      return;
    }

    switch (command.type) {
      case "advance-generation":
        // Manual advance leaves the automatic timer alone
        this.advance();
        break;
      case "toggle-cell":
        this._grid.toggle(command.x, command.y);
        break;
      case "toggle-pause":
        this.clock.togglePause();
        break;
      case "save-state":
        this.save();
        break;
      case "load-state":
        this.load();
        break;
      case "proceed":
        break;
    }
  }

  private advance(): void {
    this._grid = computeNext(this._grid);
    this._generation++;
  }

  private save(): void {
    const { saveName } = this.config;
    try {
      saveGrid(this.store, saveName, this._grid);
      this._status = `Saved generation ${this._generation} to "${saveName}"`;
      console.info(this._status);
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this._status = `Could not save: ${err.message}`;
      console.warn(this._status);
    }
  }

  private load(): void {
    const { saveName, cols, rows } = this.config;
    try {
      const loaded = loadGrid(this.store, saveName);
      if (loaded.cols !== cols || loaded.rows !== rows) {
        throw new CorruptDataError(
          `Saved grid is ${loaded.cols}x${loaded.rows}, but this simulation is ${cols}x${rows}`);
      }
      this._grid = loaded;
      this._generation = 0;
      this._status = `Loaded "${saveName}"`;
      console.info(this._status);
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      this._status = `Could not load: ${err.message}`;
      console.warn(this._status);
    }
  }
}
