/**
 * Grid class unit tests
 */

import { GenerationError } from "@tilegen/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Grid } from "../src/core/grid";

function byteGrid(width: number, height: number, outOfBounds = 0): Grid<number> {
  return new Grid<number>(width, height, { storage: "u8", fill: 0, outOfBounds });
}

describe("Grid", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construction", () => {
    it("creates grid with correct dimensions", () => {
      const grid = byteGrid(100, 50);
      expect(grid.width).toBe(100);
      expect(grid.height).toBe(50);
    });

    it("initializes with the fill value", () => {
      const grid = new Grid<number>(4, 4, { storage: "i32", fill: 7, outOfBounds: -1 });
      expect(grid.get(0, 0)).toBe(7);
      expect(grid.get(3, 3)).toBe(7);
      expect(grid.countCells(7)).toBe(16);
    });

    it("rejects non-positive or fractional dimensions", () => {
      expect(() => byteGrid(0, 5)).toThrow(GenerationError);
      expect(() => byteGrid(5, -1)).toThrow(GenerationError);
      expect(() => byteGrid(2.5, 2)).toThrow("Invalid grid dimensions: 2.5x2");
    });
  });

  describe("get/set operations", () => {
    it("sets and gets values correctly", () => {
      const grid = byteGrid(10, 10);
      grid.set(5, 5, 2);
      expect(grid.get(5, 5)).toBe(2);
    });

    it("returns the out-of-bounds value outside the grid", () => {
      const grid = new Grid<number>(3, 3, { storage: "i32", fill: 0, outOfBounds: -1 });
      expect(grid.get(-1, 0)).toBe(-1);
      expect(grid.get(0, 3)).toBe(-1);
      expect(grid.get(3, 0)).toBe(-1);
    });

    it("treats fractional coordinates as out of bounds", () => {
      const grid = new Grid<number>(3, 3, { storage: "i32", fill: 4, outOfBounds: -1 });
      expect(grid.isInBounds(0.5, 0)).toBe(false);
      expect(grid.isInBounds(1, Number.NaN)).toBe(false);
      expect(grid.get(0.5, 0)).toBe(-1);
      expect(grid.get(1.5, 1)).toBe(-1);
    });

    it("drops out-of-bounds writes", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const grid = byteGrid(3, 3);
      grid.set(5, 5, 1);
      grid.set(1.5, 1, 1);
      expect(grid.countCells(1)).toBe(0);
      expect(warn).toHaveBeenCalledTimes(2);
    });

    it("keeps fractional values in f64 storage", () => {
      const grid = new Grid<number>(2, 2, { storage: "f64", fill: 0, outOfBounds: 0 });
      grid.set(1, 1, 0.25);
      expect(grid.get(1, 1)).toBe(0.25);
    });

    it("keeps negative values in i32 storage", () => {
      const grid = new Grid<number>(2, 2, { storage: "i32", fill: 0, outOfBounds: 0 });
      grid.set(0, 1, -5);
      expect(grid.get(0, 1)).toBe(-5);
    });
  });

  describe("neighbor operations", () => {
    function neighbors4(grid: Grid<number>, x: number, y: number): number[][] {
      const seen: number[][] = [];
      grid.forEachNeighbor4(x, y, (nx, ny) => seen.push([nx, ny]));
      return seen;
    }

    function neighbors8(grid: Grid<number>, x: number, y: number): number[][] {
      const seen: number[][] = [];
      grid.forEachNeighbor8(x, y, (nx, ny) => seen.push([nx, ny]));
      return seen;
    }

    it("visits 4-neighbours West, East, North, South, in bounds only", () => {
      const grid = byteGrid(3, 3);
      expect(neighbors4(grid, 0, 0)).toEqual([
        [1, 0],
        [0, 1],
      ]);
      expect(neighbors4(grid, 1, 1)).toEqual([
        [0, 1],
        [2, 1],
        [1, 0],
        [1, 2],
      ]);
    });

    it("visits 8-neighbours row by row", () => {
      const grid = byteGrid(3, 3);
      expect(neighbors8(grid, 1, 1)).toEqual([
        [0, 0],
        [1, 0],
        [2, 0],
        [0, 1],
        [2, 1],
        [0, 2],
        [1, 2],
        [2, 2],
      ]);
      expect(neighbors8(grid, 0, 0)).toHaveLength(3);
    });

    it("counts out-of-bounds cells as the out-of-bounds value", () => {
      const grid = byteGrid(3, 3, 1);
      expect(grid.countNeighbors8(0, 0, 1)).toBe(5);
      expect(grid.countNeighbors8(1, 1, 1)).toBe(0);
      expect(grid.countNeighbors8(0, 0, 0)).toBe(3);
    });

    it("passes cell values to neighbour callbacks", () => {
      const grid = byteGrid(3, 1);
      grid.set(0, 0, 4);
      grid.set(2, 0, 6);
      const seen: number[] = [];
      grid.forEachNeighbor4(1, 0, (_x, _y, value) => seen.push(value));
      expect(seen).toEqual([4, 6]);
    });
  });

  describe("utility", () => {
    it("clones independently", () => {
      const grid = byteGrid(3, 3);
      grid.set(1, 1, 2);
      const copy = grid.clone();
      copy.set(1, 1, 0);
      expect(grid.get(1, 1)).toBe(2);
      expect(copy.get(1, 1)).toBe(0);
      expect(copy.outOfBounds).toBe(grid.outOfBounds);
    });

    it("returns a detached copy of the raw data", () => {
      const grid = byteGrid(2, 2);
      const copy = grid.getRawDataCopy();
      copy[0] = 9;
      expect(grid.get(0, 0)).toBe(0);
    });

    it("visits every cell in row-major order", () => {
      const grid = byteGrid(2, 2);
      grid.set(1, 0, 3);
      const cells: number[][] = [];
      grid.forEach((x, y, value) => cells.push([x, y, value]));
      expect(cells).toEqual([
        [0, 0, 0],
        [1, 0, 3],
        [0, 1, 0],
        [1, 1, 0],
      ]);
    });
  });
});
