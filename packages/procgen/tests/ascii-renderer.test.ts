import { describe, expect, it } from "vitest";
import { Grid } from "../src/core/grid";
import { NO_INTERSECTION, RandomWalkGenerator } from "../src/generators/random-walk";
import { RegionGrowthGenerator } from "../src/generators/region-growth";
import {
  DEFAULT_CHARSET,
  renderFieldAscii,
  renderGridAscii,
  renderRegionsAscii,
  renderWalkAscii,
  SIMPLE_CHARSET,
} from "../src/utils/ascii-renderer";

function strip(origins: { x: number; y: number }[], width = 4): RegionGrowthGenerator {
  return new RegionGrowthGenerator({ seed: 0, width, height: 1, origins });
}

describe("renderWalkAscii", () => {
  it("draws floor, walls and the cursor", () => {
    const walk = new RandomWalkGenerator({ seed: 1, width: 4, height: 1 });
    walk.carveFloor({ maxSteps: 1, intersectionAllowance: NO_INTERSECTION });
    walk.markWalls();

    // one move from (2,0) lands on (1,0) or (3,0)
    const rendered = renderWalkAscii(walk.grid, { charset: SIMPLE_CHARSET });
    expect(rendered).toBe(walk.cursor.x === 1 ? "#.# " : "  #.");

    const withCursor = renderWalkAscii(walk.grid, {
      charset: SIMPLE_CHARSET,
      markers: [walk.cursor],
    });
    expect(withCursor).toBe(walk.cursor.x === 1 ? "#@# " : "  #@");
  });

  it("uses the unicode charset by default", () => {
    const walk = new RandomWalkGenerator({ seed: 1, width: 2, height: 1 });
    walk.carveFloor({ intersectionAllowance: NO_INTERSECTION });
    expect(renderWalkAscii(walk.grid)).toBe(DEFAULT_CHARSET.floor.repeat(2));
  });
});

describe("renderRegionsAscii", () => {
  it("writes one character per region id", () => {
    const gen = strip([
      { x: 0, y: 0 },
      { x: 3, y: 0 },
    ]);
    expect(renderRegionsAscii(gen.grid)).toBe("1122");
  });

  it("marks origins when regions are passed", () => {
    const gen = strip([
      { x: 0, y: 0 },
      { x: 3, y: 0 },
    ]);
    expect(renderRegionsAscii(gen.grid, { regions: gen.regions() })).toBe("@12@");
  });

  it("wraps ids past the palette", () => {
    const gen = strip(
      [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
      ],
      3,
    );
    const charset = { ...SIMPLE_CHARSET, regions: "ab" };
    expect(renderRegionsAscii(gen.grid, { charset })).toBe("aba");
  });

  it("adds coordinates on request", () => {
    const gen = strip([
      { x: 0, y: 0 },
      { x: 3, y: 0 },
    ]);
    expect(renderRegionsAscii(gen.grid, { showCoordinates: true })).toBe(
      "    0\n  0 1122",
    );
  });
});

describe("renderFieldAscii", () => {
  it("draws non-zero cells as land", () => {
    const field = new Grid<number>(3, 2, { storage: "f64", fill: 0, outOfBounds: 0 });
    field.set(0, 0, 1.5);
    field.set(2, 1, 0.2);
    expect(renderFieldAscii(field, { charset: SIMPLE_CHARSET })).toBe("#~~\n~~#");
  });
});

describe("renderGridAscii", () => {
  it("ignores markers outside the grid", () => {
    const grid = new Grid<number>(2, 2, { storage: "u8", fill: 0, outOfBounds: 0 });
    const rendered = renderGridAscii(grid, () => ".", {
      markers: [
        { x: 5, y: 0 },
        { x: 0, y: 9 },
        { x: 1, y: 1 },
      ],
    });
    expect(rendered).toBe("..\n.@");
  });
});
