import { BrowserSnapshotStore, MemorySnapshotStore, loadGrid, saveGrid } from "./snapshot-store";
import { encodeSnapshot } from "./snapshot-codec";
import { LifeGrid, createRandomGrid } from "../simulation/grid";
import { createRNG } from "../simulation/rng";
import { CorruptDataError, NotFoundError, StorageError } from "../errors";

describe("MemorySnapshotStore", () => {
  it("throws NotFoundError for a name that was never saved", () => {
    const store = new MemorySnapshotStore();
    expect(store.exists("missing")).toBe(false);
    expect(() => store.load("missing")).toThrow(NotFoundError);
  });

  it("keeps its own copy of the saved bytes", () => {
    const store = new MemorySnapshotStore();
    const bytes = Uint8Array.of(1, 2, 3);
    store.save("a", bytes);
    bytes[0] = 9;
    expect(Array.from(store.load("a"))).toEqual([1, 2, 3]);
  });

  it("forgets removed entries", () => {
    const store = new MemorySnapshotStore();
    store.save("a", Uint8Array.of(1));
    store.remove("a");
    expect(store.exists("a")).toBe(false);
  });
});

describe("BrowserSnapshotStore", () => {
  beforeEach(() => {
    localStorage.clear();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("stores bytes as base64 under a prefixed key", () => {
    const store = new BrowserSnapshotStore(localStorage);
    store.save("x", Uint8Array.of(0, 1, 2, 255));
    expect(localStorage.getItem("life-explorer:x")).toBe("AAEC/w==");
    expect(Array.from(store.load("x"))).toEqual([0, 1, 2, 255]);
  });

  it("defaults to window.localStorage", () => {
    const store = new BrowserSnapshotStore();
    store.save("y", Uint8Array.of(7));
    expect(localStorage.getItem("life-explorer:y")).not.toBeNull();
  });

  it("throws NotFoundError when nothing is stored", () => {
    const store = new BrowserSnapshotStore(localStorage);
    expect(store.exists("nope")).toBe(false);
    expect(() => store.load("nope")).toThrow(NotFoundError);
  });

  it("reports text that is not base64 as corrupt", () => {
    localStorage.setItem("life-explorer:bad", "%%%");
    const store = new BrowserSnapshotStore(localStorage);
    expect(() => store.load("bad")).toThrow(CorruptDataError);
  });

  it("removes entries", () => {
    const store = new BrowserSnapshotStore(localStorage);
    store.save("z", Uint8Array.of(1));
    store.remove("z");
    expect(store.exists("z")).toBe(false);
  });

  it("reports a rejected write as a StorageError", () => {
    jest.spyOn(Storage.prototype, "setItem").mockImplementation(() => {
      throw new Error("quota exceeded");
    });
    const store = new BrowserSnapshotStore(localStorage);
    expect(() => store.save("big", Uint8Array.of(1))).toThrow(StorageError);
    expect(() => store.save("big", Uint8Array.of(1))).toThrow('Could not write "big": quota exceeded');
  });

  it("can be created when localStorage is blocked and fails on use", () => {
    jest.spyOn(window, "localStorage", "get").mockImplementation(() => {
      throw new Error("blocked");
    });
    const store = new BrowserSnapshotStore();
    expect(() => store.exists("x")).toThrow(StorageError);
    expect(() => store.load("x")).toThrow("Browser storage is unavailable: blocked");
  });
});

describe("saveGrid / loadGrid", () => {
  it("round-trips a whole grid through a store", () => {
    const store = new BrowserSnapshotStore(localStorage);
    const grid = createRandomGrid(40, 30, 0.2, createRNG(11));
    saveGrid(store, "saved_game_state.life", grid);
    expect(loadGrid(store, "saved_game_state.life").equals(grid)).toBe(true);
  });

  it("writes the same bytes encodeSnapshot produces", () => {
    const store = new MemorySnapshotStore();
    const grid = LifeGrid.fromLiveCells(5, 5, [[1, 2]]);
    saveGrid(store, "g", grid);
    expect(Array.from(store.load("g"))).toEqual(Array.from(encodeSnapshot(grid)));
  });

  it("surfaces corrupt bytes as CorruptDataError", () => {
    const store = new MemorySnapshotStore();
    store.save("g", Uint8Array.of(1, 2, 3));
    expect(() => loadGrid(store, "g")).toThrow(CorruptDataError);
  });
});
