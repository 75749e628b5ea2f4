/**
 * Grid checksums.
 *
 * Checksums are prefixed with the algorithm version so stored values can
 * be told apart if what gets hashed ever changes. Format: "v{version}:{hash}"
 */

import type { ReadonlyGrid } from "../grid/types";
import { FNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

/**
 * Hash of a grid's dimensions, storage and every cell, byte for byte.
 *
 * Float grids hash their IEEE-754 bytes, so two field grids only match when
 * every value is bit-identical.
 */
export function gridChecksum(
  grid: ReadonlyGrid,
  hasher: FNV64Hasher = new FNV64Hasher(),
): string {
  const data = grid.getRawDataCopy();
  hasher
    .updateInt32(grid.width)
    .updateInt32(grid.height)
    .updateInt32(data.BYTES_PER_ELEMENT)
    .updateBytes(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
