/**
 * Region Growth Generator
 *
 * Partitions the map into regions grown outward from seed points in
 * synchronised rounds, a discrete stand-in for a Voronoi diagram. Each round
 * every region, in ascending id order, tries to claim its frontier; a cell
 * goes to whichever region reaches it in the earliest round, and within a
 * round to the lowest id. Distance to the origin plays no part.
 */

import {
  parseConfig,
  type RegionGrowthConfig,
  type RegionGrowthConfigInput,
  RegionGrowthConfigSchema,
  SeededRandom,
} from "@tilegen/contracts";
import { CoordSet } from "../../core/data-structures";
import type { Point } from "../../core/geometry/types";
import { Grid } from "../../core/grid";
import type { ReadonlyGrid } from "../../core/grid/types";
import { FNV64Hasher, gridChecksum } from "../../core/hash";
import { NoOpTraceCollector, traced, warnGeneration } from "../../trace";
import type { TraceCollector } from "../../trace/types";
import type { GeneratorOptions, GridGenerator } from "../types";
import {
  type Region,
  REGION_OUT_OF_BOUNDS,
  REGION_UNCLAIMED,
  RegionRecord,
  UNKNOWN_REGION,
} from "./region";

interface Frontier {
  readonly region: RegionRecord;
  readonly positions: readonly Point[];
}

/**
 * Multi-source region growth ("Voronoi") partitioner.
 *
 * @example
 * ```typescript
 * const regions = new RegionGrowthGenerator({ seed: 3, seedCount: 10 });
 * const id = regions.regionAt(100, 100);
 * const biomeNeighbours = regions.region(id).neighbors;
 * ```
 */
export class RegionGrowthGenerator implements GridGenerator<number> {
  readonly id = "region-growth";
  readonly config: RegionGrowthConfig;
  readonly width: number;
  readonly height: number;

  private readonly ids: Grid<number>;
  private readonly registry = new Map<number, RegionRecord>();
  private growthRounds = 0;

  constructor(input: RegionGrowthConfigInput, options: GeneratorOptions = {}) {
    const config = parseConfig(RegionGrowthConfigSchema, input, "region growth");
    const trace = options.trace ?? new NoOpTraceCollector();

    this.config = config;
    this.width = config.width;
    this.height = config.height;
    this.ids = new Grid<number>(config.width, config.height, {
      storage: "i32",
      fill: REGION_UNCLAIMED,
      outOfBounds: REGION_OUT_OF_BOUNDS,
    });

    const origins = traced(trace, "region-growth.place-origins", () =>
      config.origins ?? drawOrigins(new SeededRandom(config.seed), config),
    );
    origins.forEach((origin, index) => {
      const id = index + 1;
      this.registry.set(id, new RegionRecord(id, { x: origin.x, y: origin.y }));
    });

    traced(trace, "region-growth.grow", () => this.grow(trace));
  }

  private grow(trace: TraceCollector): void {
    const queued = new CoordSet(this.width, this.height);
    let frontiers: Frontier[] = [...this.registry.values()].map((region) => ({
      region,
      positions: [region.origin],
    }));

    while (frontiers.length > 0) {
      this.growthRounds++;
      const next: Frontier[] = [];

      for (const { region, positions } of frontiers) {
        const nextPositions: Point[] = [];

        for (const position of positions) {
          const owner = this.ids.getUnsafe(position.x, position.y);

          if (owner !== REGION_UNCLAIMED) {
            region.meet(owner);
            continue;
          }

          this.ids.setUnsafe(position.x, position.y, region.id);
          region.claim(position);

          this.ids.forEachNeighbor8(position.x, position.y, (nx, ny) => {
            if (queued.has(nx, ny)) return;
            queued.add(nx, ny);
            nextPositions.push({ x: nx, y: ny });
          });
        }

        // dedupe is per region and per round
        for (const p of nextPositions) queued.delete(p.x, p.y);

        if (nextPositions.length > 0) {
          next.push({ region, positions: nextPositions });
        }
      }

      frontiers = next;
    }

    trace.decision(
      "region-growth.grow",
      "Growth rounds",
      [`${this.registry.size} regions`],
      this.growthRounds,
      `Saturated ${this.width}x${this.height} grid in ${this.growthRounds} rounds`,
    );

    for (const region of this.registry.values()) {
      if (region.size === 0) {
        warnGeneration(
          trace,
          "region-growth.grow",
          `Region ${region.id} claimed no cells; its origin (${region.origin.x}, ${region.origin.y}) was taken first`,
        );
      }
    }
  }

  /**
   * Region id per cell, read-only
   */
  get grid(): ReadonlyGrid<number> {
    return this.ids;
  }

  /**
   * Growth rounds needed to saturate the grid
   */
  get rounds(): number {
    return this.growthRounds;
  }

  /**
   * Region id at (x, y): 0 if unclaimed, -1 outside the grid
   */
  regionAt(x: number, y: number): number {
    return this.ids.get(x, y);
  }

  /**
   * Cells claimed by `id`, in claim order; empty for unknown ids
   */
  positionsOf(id: number): readonly Point[] {
    return this.registry.get(id)?.positions ?? [];
  }

  /**
   * Region `id`, or `UNKNOWN_REGION` when there is none
   */
  region(id: number): Region {
    return this.registry.get(id) ?? UNKNOWN_REGION;
  }

  /**
   * Every region in id order
   */
  regions(): readonly Region[] {
    return [...this.registry.values()];
  }

  checksum(): string {
    const hasher = new FNV64Hasher();
    for (const region of this.registry.values()) {
      hasher.updateInt32(region.id).updateInt32(region.neighbors.length);
      for (const neighbor of region.neighbors) hasher.updateInt32(neighbor);
    }
    return gridChecksum(this.ids, hasher);
  }
}

/**
 * One origin per region, each an x draw followed by a y draw. Repeats are
 * allowed.
 */
function drawOrigins(rng: SeededRandom, config: RegionGrowthConfig): Point[] {
  const origins: Point[] = [];
  for (let i = 0; i < config.seedCount; i++) {
    const x = rng.range(0, config.width - 1);
    const y = rng.range(0, config.height - 1);
    origins.push({ x, y });
  }
  return origins;
}
