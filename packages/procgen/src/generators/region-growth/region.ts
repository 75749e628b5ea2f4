/**
 * Region registry entries for the region growth generator.
 */

import type { Point } from "../../core/geometry/types";

/** `regionAt` result outside the grid */
export const REGION_OUT_OF_BOUNDS = -1;
/** Grid value of a cell no region has claimed */
export const REGION_UNCLAIMED = 0;
/** Id carried by the placeholder returned for unknown ids */
export const UNKNOWN_REGION_ID = -1;

/**
 * A grown region, read-only to callers.
 *
 * `neighbors` is one-directional: it lists the regions this region ran into
 * while growing. Use `symmetricAdjacency` for the two-way relation.
 */
export interface Region {
  readonly id: number;
  readonly origin: Point;
  /** Claimed cells in claim order */
  readonly positions: readonly Point[];
  /** Foreign region ids in discovery order, without duplicates */
  readonly neighbors: readonly number[];
  readonly size: number;
}

/**
 * Placeholder for lookups of unknown ids
 */
export const UNKNOWN_REGION: Region = Object.freeze({
  id: UNKNOWN_REGION_ID,
  origin: Object.freeze({ x: -1, y: -1 }),
  positions: Object.freeze([]),
  neighbors: Object.freeze([]),
  size: 0,
});

/**
 * Append-only region state owned by the generator
 */
export class RegionRecord implements Region {
  private readonly claimed: Point[] = [];
  private readonly adjacent: number[] = [];

  constructor(
    readonly id: number,
    readonly origin: Point,
  ) {}

  get positions(): readonly Point[] {
    return this.claimed;
  }

  get neighbors(): readonly number[] {
    return this.adjacent;
  }

  get size(): number {
    return this.claimed.length;
  }

  claim(position: Point): void {
    this.claimed.push(position);
  }

  /**
   * Record a foreign region met during growth. Own id and repeats are
   * ignored.
   */
  meet(otherId: number): void {
    if (otherId === this.id || this.adjacent.includes(otherId)) return;
    this.adjacent.push(otherId);
  }
}
