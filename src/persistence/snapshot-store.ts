import { LifeGrid } from "../simulation/grid";
import type { IGrid } from "../types/grid-types";
import { CorruptDataError, NotFoundError, StorageError } from "../errors";
import { decodeSnapshot, encodeSnapshot } from "./snapshot-codec";

/** Named, synchronous storage for snapshot bytes. */
export interface SnapshotStore {
  save(name: string, bytes: Uint8Array): void;
  /** Throws NotFoundError if nothing was saved under `name`. */
  load(name: string): Uint8Array;
  exists(name: string): boolean;
  remove(name: string): void;
}

/** Keeps snapshots in process memory. Used by tests and headless runs. */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly entries = new Map<string, Uint8Array>();

  save(name: string, bytes: Uint8Array): void {
    this.entries.set(name, bytes.slice());
  }

  load(name: string): Uint8Array {
    const bytes = this.entries.get(name);
    if (!bytes) throw new NotFoundError(name);
    return bytes.slice();
  }

  exists(name: string): boolean {
    return this.entries.has(name);
  }

  remove(name: string): void {
    this.entries.delete(name);
  }
}

function bytesToBase64(bytes: Uint8Array): string {
  let binary = "";
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary);
}

function base64ToBytes(text: string): Uint8Array {
  let binary: string;
  try {
    binary = atob(text);
  } catch (err) {
    throw new CorruptDataError(`Stored snapshot is not valid base64: ${String(err)}`);
  }
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Keeps snapshots as base64 text in a Web Storage area (localStorage by
 * default). Keys are prefixed so other data in the same origin is untouched.
 *
 * localStorage is looked up on each call, since merely reading
 * `window.localStorage` throws when the browser blocks storage. Any failure
 * of the storage area surfaces as a StorageError.
 */
export class BrowserSnapshotStore implements SnapshotStore {
  static readonly KEY_PREFIX = "life-explorer:";

  private readonly storage: Storage | null;

  constructor(storage?: Storage) {
    this.storage = storage ?? null;
  }

  private key(name: string): string {
    return BrowserSnapshotStore.KEY_PREFIX + name;
  }

  private withStorage<T>(action: string, fn: (storage: Storage) => T): T {
    let storage: Storage;
    try {
      storage = this.storage ?? window.localStorage;
    } catch (err) {
      throw new StorageError(`Browser storage is unavailable: ${describe(err)}`);
    }
    try {
      return fn(storage);
    } catch (err) {
      throw new StorageError(`Could not ${action}: ${describe(err)}`);
    }
  }

  save(name: string, bytes: Uint8Array): void {
    const text = bytesToBase64(bytes);
    this.withStorage(`write "${name}"`, storage => storage.setItem(this.key(name), text));
  }

  load(name: string): Uint8Array {
    const text = this.withStorage(`read "${name}"`, storage => storage.getItem(this.key(name)));
    if (text === null) throw new NotFoundError(name);
    return base64ToBytes(text);
  }

  exists(name: string): boolean {
    return this.withStorage(`read "${name}"`, storage => storage.getItem(this.key(name)) !== null);
  }

  remove(name: string): void {
    this.withStorage(`remove "${name}"`, storage => storage.removeItem(this.key(name)));
  }
}

/** Serializes the whole grid and writes it under `name`. */
export function saveGrid(store: SnapshotStore, name: string, grid: IGrid): void {
  store.save(name, encodeSnapshot(grid));
}

/** Reads and decodes the grid saved under `name`. Nothing is modified on failure. */
export function loadGrid(store: SnapshotStore, name: string): LifeGrid {
  return decodeSnapshot(store.load(name));
}
