/**
 * Random Walk ("drunk walk") Generator
 *
 * A single cursor wanders the map carving floor. Walls are derived
 * afterwards from floor adjacency. Carving can be repeated on the same
 * instance: the cursor, the random stream and the tiles all carry over, so
 * passes with different settings compose.
 */

import {
  type CarveOptionsInput,
  CarveOptionsSchema,
  NO_INTERSECTION,
  parseConfig,
  type RandomWalkConfig,
  type RandomWalkConfigInput,
  RandomWalkConfigSchema,
  SeededRandom,
  UNLIMITED_STEPS,
} from "@tilegen/contracts";
import { DIRECTIONS_4, type Point } from "../../core/geometry/types";
import { Grid } from "../../core/grid";
import type { ReadonlyGrid } from "../../core/grid/types";
import { FNV64Hasher, gridChecksum } from "../../core/hash";
import { NoOpTraceCollector, traced } from "../../trace";
import type { TraceCollector } from "../../trace/types";
import type { GeneratorOptions, GridGenerator } from "../types";
import { WalkTile } from "./constants";

/**
 * Outcome of one `carveFloor` call
 */
export interface CarveSummary {
  /** Step attempts made, successful or not */
  readonly attempts: number;
  /** Attempts that moved the cursor */
  readonly moves: number;
  /** True when the call ended because no direction was accepted */
  readonly stuck: boolean;
}

/**
 * Random-walk corridor carver.
 *
 * The starting cell is not marked as floor: only cells entered by an
 * accepted move become FLOOR.
 *
 * @example
 * ```typescript
 * const walk = new RandomWalkGenerator({ seed: 32, width: 200, height: 200 });
 * walk.carveFloor({ intersectionAllowance: BASIC_INTERSECTION });
 * walk.carveFloor({ intersectionAllowance: 0.82 });
 * walk.markWalls();
 * ```
 */
export class RandomWalkGenerator implements GridGenerator<WalkTile> {
  readonly id = "random-walk";
  readonly config: RandomWalkConfig;
  readonly width: number;
  readonly height: number;

  private readonly rng: SeededRandom;
  private readonly tiles: Grid<WalkTile>;
  private readonly trace: TraceCollector;
  private x: number;
  private y: number;
  private walkable = true;

  constructor(input: RandomWalkConfigInput, options: GeneratorOptions = {}) {
    const config = parseConfig(RandomWalkConfigSchema, input, "random walk");

    this.config = config;
    this.width = config.width;
    this.height = config.height;
    this.trace = options.trace ?? new NoOpTraceCollector();
    this.rng = new SeededRandom(config.seed);
    this.tiles = new Grid<WalkTile>(config.width, config.height, {
      storage: "u8",
      fill: WalkTile.EMPTY,
      outOfBounds: WalkTile.EMPTY,
    });
    this.x = Math.floor(config.width / 2);
    this.y = Math.floor(config.height / 2);
  }

  get grid(): ReadonlyGrid<WalkTile> {
    return this.tiles;
  }

  get cursor(): Point {
    return { x: this.x, y: this.y };
  }

  /**
   * False once the last step attempt found no acceptable direction
   */
  get canWalk(): boolean {
    return this.walkable;
  }

  /**
   * Tile at (x, y); EMPTY outside the grid
   */
  tileAt(x: number, y: number): WalkTile {
    return this.tiles.get(x, y);
  }

  /**
   * Walk from the current cursor, turning entered cells into FLOOR.
   *
   * Ends when `maxSteps` attempts have been made or when an attempt finds no
   * acceptable direction. Getting stuck is a normal way to finish.
   *
   * @throws {GenerationError} `CONFIG_INVALID` for a negative budget (other
   *   than `UNLIMITED_STEPS`) or an allowance outside [0, 1]
   */
  carveFloor(options: CarveOptionsInput = {}): CarveSummary {
    const { maxSteps, intersectionAllowance } = parseConfig(
      CarveOptionsSchema,
      options,
      "carve",
    );

    return traced(this.trace, "random-walk.carve-floor", () => {
      let remaining = maxSteps;
      let attempts = 0;
      let moves = 0;
      let canWalk = true;

      while ((remaining === UNLIMITED_STEPS || remaining > 0) && canWalk) {
        canWalk = this.step(intersectionAllowance);
        attempts++;
        if (canWalk) moves++;
        if (remaining !== UNLIMITED_STEPS) remaining--;
      }

      if (attempts > 0) this.walkable = canWalk;

      this.trace.decision(
        "random-walk.carve-floor",
        "Walk termination",
        ["stuck", "budget exhausted"],
        canWalk ? "budget exhausted" : "stuck",
        `${moves} moves in ${attempts} attempts, cursor at (${this.x}, ${this.y})`,
      );

      return { attempts, moves, stuck: !canWalk };
    });
  }

  /**
   * One step attempt. Directions are drawn without replacement; the first
   * in-bounds one whose target is EMPTY, or wins the intersection roll, is
   * taken.
   */
  private step(intersectionAllowance: number): boolean {
    const pool = [...DIRECTIONS_4];

    while (pool.length > 0) {
      const dir = this.rng.takeRandom(pool);
      if (!dir) break;

      const nx = this.x + dir.x;
      const ny = this.y + dir.y;
      if (!this.tiles.isInBounds(nx, ny)) continue;

      if (
        this.tiles.getUnsafe(nx, ny) === WalkTile.EMPTY ||
        (intersectionAllowance !== NO_INTERSECTION &&
          this.rng.next() <= intersectionAllowance)
      ) {
        this.x = nx;
        this.y = ny;
        this.tiles.setUnsafe(nx, ny, WalkTile.FLOOR);
        return true;
      }
    }

    return false;
  }

  /**
   * Turn every EMPTY cell touching FLOOR (8-connectivity) into WALL.
   *
   * Only FLOOR cells decide, and FLOOR is never written here, so the single
   * in-place pass sees the same neighbourhoods as a pass over a snapshot.
   *
   * @returns Number of cells that became WALL
   */
  markWalls(): number {
    return traced(this.trace, "random-walk.mark-walls", () => {
      let marked = 0;

      for (let y = 0; y < this.height; y++) {
        for (let x = 0; x < this.width; x++) {
          if (this.tiles.getUnsafe(x, y) !== WalkTile.EMPTY) continue;
          if (this.tiles.countNeighbors8(x, y, WalkTile.FLOOR) > 0) {
            this.tiles.setUnsafe(x, y, WalkTile.WALL);
            marked++;
          }
        }
      }

      return marked;
    });
  }

  checksum(): string {
    const hasher = new FNV64Hasher().updateInt32(this.x).updateInt32(this.y);
    return gridChecksum(this.tiles, hasher);
  }
}

/**
 * Build a finished walk map in one call: construct, carve once, mark walls.
 */
export function generateRandomWalkMap(
  config: RandomWalkConfigInput & CarveOptionsInput,
  options: GeneratorOptions = {},
): RandomWalkGenerator {
  const { maxSteps, intersectionAllowance, ...walkConfig } = config;
  const walk = new RandomWalkGenerator(walkConfig, options);
  walk.carveFloor({ maxSteps, intersectionAllowance });
  walk.markWalls();
  return walk;
}
