import { LifeGrid } from "../simulation/grid";
import type { IGrid } from "../types/grid-types";
import { CorruptDataError } from "../errors";

/**
 * Snapshot layout (little-endian):
 *
 *   offset 0  "LIFE"         magic, 4 bytes
 *   offset 4  version        u8
 *   offset 5  cols           u32
 *   offset 9  rows           u32
 *   offset 13 cells          ceil(cols * rows / 8) bytes, row-major,
 *                            bit i of the body is cell i (LSB first)
 */
export const SNAPSHOT_MAGIC = [0x4c, 0x49, 0x46, 0x45]; // "LIFE"
export const SNAPSHOT_VERSION = 1;
export const SNAPSHOT_HEADER_BYTES = 13;

export function packedLength(cellCount: number): number {
  return Math.ceil(cellCount / 8);
}

export function encodeSnapshot(grid: IGrid): Uint8Array {
  const cellCount = grid.cols * grid.rows;
  const bytes = new Uint8Array(SNAPSHOT_HEADER_BYTES + packedLength(cellCount));
  const view = new DataView(bytes.buffer);

  bytes.set(SNAPSHOT_MAGIC, 0);
  view.setUint8(4, SNAPSHOT_VERSION);
  view.setUint32(5, grid.cols, true);
  view.setUint32(9, grid.rows, true);

  for (let i = 0; i < cellCount; i++) {
    if (grid.cells[i]) {
      bytes[SNAPSHOT_HEADER_BYTES + (i >> 3)] |= 1 << (i & 7);
    }
  }
  return bytes;
}

export function decodeSnapshot(bytes: Uint8Array): LifeGrid {
  if (bytes.length < SNAPSHOT_HEADER_BYTES) {
    throw new CorruptDataError(`Snapshot is ${bytes.length} bytes, shorter than its ${SNAPSHOT_HEADER_BYTES}-byte header`);
  }
  for (let i = 0; i < SNAPSHOT_MAGIC.length; i++) {
    if (bytes[i] !== SNAPSHOT_MAGIC[i]) {
      throw new CorruptDataError("Snapshot does not start with the LIFE marker");
    }
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint8(4);
  if (version !== SNAPSHOT_VERSION) {
    throw new CorruptDataError(`Unsupported snapshot version ${version}`);
  }

  const cols = view.getUint32(5, true);
  const rows = view.getUint32(9, true);
  if (cols === 0 || rows === 0) {
    throw new CorruptDataError(`Snapshot has empty dimensions ${cols}x${rows}`);
  }

  const cellCount = cols * rows;
  const bodyLength = bytes.length - SNAPSHOT_HEADER_BYTES;
  if (bodyLength !== packedLength(cellCount)) {
    throw new CorruptDataError(
      `Snapshot for a ${cols}x${rows} grid needs ${packedLength(cellCount)} cell bytes, found ${bodyLength}`);
  }

  // Padding bits past the last cell must be zero
  const spare = cellCount & 7;
  if (spare !== 0 && bytes[bytes.length - 1] >> spare !== 0) {
    throw new CorruptDataError("Snapshot has stray bits after the last cell");
  }

  const cells = new Uint8Array(cellCount);
  for (let i = 0; i < cellCount; i++) {
    cells[i] = (bytes[SNAPSHOT_HEADER_BYTES + (i >> 3)] >> (i & 7)) & 1;
  }
  return new LifeGrid(cols, rows, cells);
}
