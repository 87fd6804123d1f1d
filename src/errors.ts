export type LifeErrorCode = "OutOfBounds" | "NotFound" | "CorruptData" | "Storage" | "Config";

/** Base class for every error the simulation raises on purpose. */
export class LifeError extends Error {
  readonly code: LifeErrorCode;

  constructor(code: LifeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A cell coordinate lies outside the grid. */
export class OutOfBoundsError extends LifeError {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, cols: number, rows: number) {
    super("OutOfBounds", `Cell (${x}, ${y}) is outside the ${cols}x${rows} grid`);
    this.x = x;
    this.y = y;
  }
}

/** A load was requested for a snapshot that was never saved. */
export class NotFoundError extends LifeError {
  readonly destination: string;

  constructor(destination: string) {
    super("NotFound", `No saved snapshot named "${destination}"`);
    this.destination = destination;
  }
}

/** Snapshot bytes could not be turned back into a consistent grid. */
export class CorruptDataError extends LifeError {
  constructor(message: string) {
    super("CorruptData", message);
  }
}

/** The browser refused to read or write snapshot storage (quota, privacy settings). */
export class StorageError extends LifeError {
  constructor(message: string) {
    super("Storage", message);
  }
}

/** Startup configuration is invalid. */
export class ConfigError extends LifeError {
  constructor(message: string) {
    super("Config", message);
  }
}

/** True for errors that are reported to the user and then ignored. */
export function isRecoverable(err: unknown): err is NotFoundError | CorruptDataError | StorageError {
  return err instanceof NotFoundError || err instanceof CorruptDataError || err instanceof StorageError;
}
