import {
  DEFAULT_WIDTH, DEFAULT_HEIGHT, DEFAULT_COLS, DEFAULT_ROWS, DEFAULT_LIVE_PROBABILITY,
  DEFAULT_TICK_INTERVAL_SECONDS, DEFAULT_FPS, DEFAULT_SAVE_NAME,
} from "./constants";
import { ConfigError } from "./errors";

export interface SimulationConfig {
  /** Canvas size in pixels. */
  width: number;
  height: number;
  cols: number;
  rows: number;
  liveProbability: number;
  tickIntervalSeconds: number;
  /** Frame-rate cap for the render loop. */
  framesPerSecond: number;
  /** Seed for the initial board; unseeded (Math.random) when absent. */
  seed?: number;
  saveName: string;
}

export const DEFAULT_CONFIG: Readonly<SimulationConfig> = {
  width: DEFAULT_WIDTH,
  height: DEFAULT_HEIGHT,
  cols: DEFAULT_COLS,
  rows: DEFAULT_ROWS,
  liveProbability: DEFAULT_LIVE_PROBABILITY,
  tickIntervalSeconds: DEFAULT_TICK_INTERVAL_SECONDS,
  framesPerSecond: DEFAULT_FPS,
  saveName: DEFAULT_SAVE_NAME,
};

function positiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

function positiveNumber(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
}

/** Rejects configurations the simulation cannot start with. Returns the config unchanged. */
export function validateConfig(config: SimulationConfig): SimulationConfig {
  positiveInteger("width", config.width);
  positiveInteger("height", config.height);
  positiveInteger("cols", config.cols);
  positiveInteger("rows", config.rows);
  if (config.cols > config.width || config.rows > config.height) {
    throw new ConfigError(
      `A ${config.cols}x${config.rows} grid does not fit a ${config.width}x${config.height} canvas`);
  }
  if (!(config.liveProbability >= 0 && config.liveProbability <= 1)) {
    throw new ConfigError(`liveProbability must be within [0, 1], got ${config.liveProbability}`);
  }
  positiveNumber("tickIntervalSeconds", config.tickIntervalSeconds);
  positiveNumber("framesPerSecond", config.framesPerSecond);
  if (config.seed !== undefined && !Number.isInteger(config.seed)) {
    throw new ConfigError(`seed must be an integer, got ${config.seed}`);
  }
  if (config.saveName.trim() === "") {
    throw new ConfigError("saveName must not be empty");
  }
  return config;
}

/** Query-string parameter names for each overridable numeric setting. */
const NUMERIC_PARAMS: readonly [string, keyof Omit<SimulationConfig, "saveName">][] = [
  ["width", "width"],
  ["height", "height"],
  ["cols", "cols"],
  ["rows", "rows"],
  ["p", "liveProbability"],
  ["tick", "tickIntervalSeconds"],
  ["fps", "framesPerSecond"],
  ["seed", "seed"],
];

/**
 * Builds a validated config from URL query parameters, e.g.
 * `?cols=60&rows=40&p=0.3&tick=0.5&seed=42`. Unknown parameters are ignored.
 */
export function parseConfig(search: string, base: Readonly<SimulationConfig> = DEFAULT_CONFIG): SimulationConfig {
  const params = new URLSearchParams(search);
  const config: SimulationConfig = { ...base };

  for (const [param, field] of NUMERIC_PARAMS) {
    const raw = params.get(param);
    if (raw === null) continue;
    const value = raw.trim() === "" ? NaN : Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigError(`Parameter "${param}" must be a number, got "${raw}"`);
    }
    config[field] = value;
  }

  const saveName = params.get("save");
  if (saveName !== null) config.saveName = saveName;

  return validateConfig(config);
}
