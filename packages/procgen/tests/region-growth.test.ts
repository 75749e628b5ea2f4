/**
 * Region growth generator tests
 */

import { GenerationError } from "@tilegen/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  REGION_OUT_OF_BOUNDS,
  REGION_UNCLAIMED,
  RegionGrowthGenerator,
  UNKNOWN_REGION,
} from "../src/generators/region-growth";
import { DefaultTraceCollector } from "../src/trace";

describe("RegionGrowthGenerator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("forced origins", () => {
    it("splits a 4x1 strip between two end origins", () => {
      const gen = new RegionGrowthGenerator({
        seed: 0,
        width: 4,
        height: 1,
        origins: [
          { x: 0, y: 0 },
          { x: 3, y: 0 },
        ],
      });

      expect([0, 1, 2, 3].map((x) => gen.regionAt(x, 0))).toEqual([1, 1, 2, 2]);
      expect(gen.positionsOf(1)).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
      ]);
      expect(gen.positionsOf(2)).toEqual([
        { x: 3, y: 0 },
        { x: 2, y: 0 },
      ]);
      expect(gen.region(1).neighbors).toEqual([2]);
      expect(gen.region(2).neighbors).toEqual([1]);
      expect(gen.rounds).toBe(3);
    });

    it("gives a contested cell to the lower id", () => {
      const left = new RegionGrowthGenerator({
        seed: 0,
        width: 3,
        height: 1,
        origins: [
          { x: 0, y: 0 },
          { x: 2, y: 0 },
        ],
      });
      expect(left.regionAt(1, 0)).toBe(1);
      expect(left.region(2).size).toBe(1);

      const right = new RegionGrowthGenerator({
        seed: 0,
        width: 3,
        height: 1,
        origins: [
          { x: 2, y: 0 },
          { x: 0, y: 0 },
        ],
      });
      expect(right.regionAt(1, 0)).toBe(1);
      expect(right.positionsOf(1)).toEqual([
        { x: 2, y: 0 },
        { x: 1, y: 0 },
      ]);
    });

    it("leaves a duplicate origin empty, pointing at the region that took it", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const trace = new DefaultTraceCollector();
      const gen = new RegionGrowthGenerator(
        {
          seed: 0,
          width: 3,
          height: 3,
          origins: [
            { x: 1, y: 1 },
            { x: 1, y: 1 },
          ],
        },
        { trace },
      );

      expect(gen.region(1).size).toBe(9);
      expect(gen.region(1).neighbors).toEqual([]);
      expect(gen.region(2).size).toBe(0);
      expect(gen.region(2).neighbors).toEqual([1]);
      expect(gen.positionsOf(2)).toEqual([]);
      expect(gen.rounds).toBe(3);

      const warnings = trace.getEvents().filter((e) => e.eventType === "warning");
      expect(warnings.map((e) => e.data)).toEqual([
        {
          message:
            "Region 2 claimed no cells; its origin (1, 1) was taken first",
        },
      ]);
      expect(warn).toHaveBeenCalledWith(
        "[region-growth.grow] Region 2 claimed no cells; its origin (1, 1) was taken first",
      );
    });

    it("claims the whole grid with a single origin", () => {
      const gen = new RegionGrowthGenerator({
        seed: 0,
        width: 7,
        height: 4,
        origins: [{ x: 0, y: 0 }],
      });
      expect(gen.region(1).size).toBe(28);
      expect(gen.region(1).neighbors).toEqual([]);
      expect(gen.positionsOf(1)[0]).toEqual({ x: 0, y: 0 });
      // Chebyshev radius 6 reaches (6, 3), plus one round that finds nothing
      expect(gen.rounds).toBe(8);
    });

    it("rejects origins outside the grid", () => {
      expect(
        () =>
          new RegionGrowthGenerator({
            seed: 0,
            width: 3,
            height: 3,
            origins: [{ x: 3, y: 0 }],
          }),
      ).toThrow("Origin (3, 0) is outside the 3x3 grid");
    });

    it("rejects a seedCount that disagrees with origins", () => {
      expect(
        () =>
          new RegionGrowthGenerator({
            seed: 0,
            width: 3,
            height: 3,
            seedCount: 2,
            origins: [{ x: 0, y: 0 }],
          }),
      ).toThrow(GenerationError);
    });
  });

  describe("queries", () => {
    const gen = new RegionGrowthGenerator({
      seed: 0,
      width: 4,
      height: 1,
      origins: [
        { x: 0, y: 0 },
        { x: 3, y: 0 },
      ],
    });

    it("returns -1 outside the grid", () => {
      expect(gen.regionAt(-1, 0)).toBe(REGION_OUT_OF_BOUNDS);
      expect(gen.regionAt(4, 0)).toBe(REGION_OUT_OF_BOUNDS);
      expect(gen.regionAt(0, 1)).toBe(REGION_OUT_OF_BOUNDS);
    });

    it("returns -1 for fractional coordinates", () => {
      expect(gen.regionAt(1.5, 0)).toBe(REGION_OUT_OF_BOUNDS);
      expect(gen.regionAt(1, 0.5)).toBe(REGION_OUT_OF_BOUNDS);
    });

    it("returns the placeholder region for unknown ids", () => {
      expect(gen.region(99)).toBe(UNKNOWN_REGION);
      expect(gen.region(0).id).toBe(-1);
      expect(gen.region(-3).origin).toEqual({ x: -1, y: -1 });
      expect(gen.positionsOf(99)).toEqual([]);
    });

    it("lists regions in id order", () => {
      expect(gen.regions().map((r) => [r.id, r.origin])).toEqual([
        [1, { x: 0, y: 0 }],
        [2, { x: 3, y: 0 }],
      ]);
    });
  });

  describe("random origins", () => {
    it("draws seedCount origins in bounds", () => {
      const gen = new RegionGrowthGenerator({
        seed: 42,
        width: 25,
        height: 15,
        seedCount: 6,
      });

      expect(gen.regions()).toHaveLength(6);
      for (const region of gen.regions()) {
        expect(gen.grid.isInBounds(region.origin.x, region.origin.y)).toBe(true);
      }
    });

    it("defaults to 10 regions", () => {
      const gen = new RegionGrowthGenerator({ seed: 42, width: 20, height: 20 });
      expect(gen.regions()).toHaveLength(10);
    });

    it("leaves no cell unclaimed", () => {
      const gen = new RegionGrowthGenerator({
        seed: 7,
        width: 31,
        height: 17,
        seedCount: 5,
      });
      expect(gen.grid.countCells(REGION_UNCLAIMED)).toBe(0);
    });

    it("starts every non-empty region at its origin", () => {
      const gen = new RegionGrowthGenerator({
        seed: 19,
        width: 16,
        height: 16,
        seedCount: 12,
      });
      for (const region of gen.regions()) {
        if (region.size === 0) continue;
        expect(region.positions[0]).toEqual(region.origin);
        expect(gen.regionAt(region.origin.x, region.origin.y)).toBe(region.id);
      }
    });

    it("rejects seedCount below 1", () => {
      try {
        new RegionGrowthGenerator({ seed: 1, width: 5, height: 5, seedCount: 0 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(GenerationError);
        if (GenerationError.isGenerationError(error)) {
          expect(error.code).toBe("CONFIG_INVALID");
        }
      }
    });
  });

  it("records its phases in order", () => {
    const trace = new DefaultTraceCollector();
    new RegionGrowthGenerator(
      {
        seed: 0,
        width: 4,
        height: 1,
        origins: [
          { x: 0, y: 0 },
          { x: 3, y: 0 },
        ],
      },
      { trace },
    );

    expect(trace.getEvents().map((e) => `${e.scope}:${e.eventType}`)).toEqual([
      "region-growth.place-origins:start",
      "region-growth.place-origins:end",
      "region-growth.grow:start",
      "region-growth.grow:decision",
      "region-growth.grow:end",
    ]);
  });
});
