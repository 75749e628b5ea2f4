/**
 * FNV-1a 64 and grid checksum tests
 */

import { describe, expect, it } from "vitest";
import { Grid } from "../src/core/grid";
import { CHECKSUM_VERSION, FNV64Hasher, gridChecksum } from "../src/core/hash";

describe("FNV64Hasher", () => {
  it("starts from the offset basis", () => {
    expect(new FNV64Hasher().digest()).toBe("cbf29ce484222325");
  });

  it("matches the published digest for 'a'", () => {
    expect(new FNV64Hasher().updateByte(0x61).digest()).toBe("af63dc4c8601ec8c");
    expect(new FNV64Hasher().updateBytes(new Uint8Array([0x61])).digest()).toBe(
      "af63dc4c8601ec8c",
    );
  });

  it("hashes int32 values as four little-endian bytes", () => {
    const a = new FNV64Hasher().updateInt32(0x04030201).digest();
    const b = new FNV64Hasher().updateBytes(new Uint8Array([1, 2, 3, 4])).digest();
    expect(a).toBe(b);
  });

  it("folds negative int32 values to their two's complement bytes", () => {
    const a = new FNV64Hasher().updateInt32(-1).digest();
    const b = new FNV64Hasher()
      .updateBytes(new Uint8Array([0xff, 0xff, 0xff, 0xff]))
      .digest();
    expect(a).toBe(b);
  });
});

describe("gridChecksum", () => {
  const make = () =>
    new Grid<number>(4, 3, { storage: "i32", fill: 0, outOfBounds: -1 });

  it("is versioned", () => {
    const checksum = gridChecksum(make());
    expect(checksum.startsWith(`v${CHECKSUM_VERSION}:`)).toBe(true);
    expect(checksum).toHaveLength(19);
  });

  it("matches for equal grids and differs after a change", () => {
    const a = make();
    const b = make();
    expect(gridChecksum(a)).toBe(gridChecksum(b));
    b.set(2, 1, 3);
    expect(gridChecksum(a)).not.toBe(gridChecksum(b));
  });

  it("distinguishes dimensions with the same cell count", () => {
    const wide = new Grid<number>(6, 2, { storage: "u8", fill: 0, outOfBounds: 0 });
    const tall = new Grid<number>(2, 6, { storage: "u8", fill: 0, outOfBounds: 0 });
    expect(gridChecksum(wide)).not.toBe(gridChecksum(tall));
  });
});
