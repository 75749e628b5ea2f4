/**
 * Charge Field Generator
 *
 * Scatters positive and negative point charges over the map, sums their
 * softened potential at every cell and keeps the cells at or above a cutoff
 * derived from the mean potential. The surviving cells form landmasses
 * around clusters of positive charge.
 */

import {
  type ChargeFieldConfig,
  type ChargeFieldConfigInput,
  ChargeFieldConfigSchema,
  parseConfig,
  SeededRandom,
} from "@tilegen/contracts";
import { Grid } from "../../core/grid";
import type { ReadonlyGrid } from "../../core/grid/types";
import { FNV64Hasher, gridChecksum } from "../../core/hash";
import { NoOpTraceCollector, traced, warnGeneration } from "../../trace";
import type { TraceCollector } from "../../trace/types";
import type { GeneratorOptions, GridGenerator } from "../types";
import { FIELD_EMPTY, MAX_RECOMMENDED_FIELD_WORK } from "./constants";

export type Polarity = 1 | -1;

export interface Charge {
  readonly x: number;
  readonly y: number;
  readonly polarity: Polarity;
}

/**
 * Shared magnitude of every charge: the mean side length spread over the
 * square root of the charge count.
 */
export function computeChargeStrength(
  width: number,
  height: number,
  chargeCount: number,
): number {
  return (width + height) / 2 / Math.sqrt(chargeCount);
}

/**
 * Potential at (x, y). A charge sitting exactly on the cell contributes its
 * full strength instead of dividing by zero.
 */
export function potentialAt(
  charges: readonly Charge[],
  chargeStrength: number,
  x: number,
  y: number,
): number {
  let total = 0;
  for (const charge of charges) {
    const dx = x - charge.x;
    const dy = y - charge.y;
    const distance = Math.sqrt(dx * dx + dy * dy);
    const contribution =
      distance !== 0 ? chargeStrength / distance : chargeStrength;
    total += charge.polarity * contribution;
  }
  return total;
}

/**
 * Charge-field landmass generator.
 *
 * Cells below the cutoff become 0; cells at or above it keep their raw
 * potential rather than being normalised. The asymmetry is kept on purpose
 * so existing seeds render the same.
 *
 * @example
 * ```typescript
 * const field = new ChargeFieldGenerator({
 *   seed: 0,
 *   width: 500,
 *   height: 500,
 *   positiveCharges: 300,
 *   negativeCharges: 100,
 *   cutoffMultiplier: 1.15,
 * });
 * const isLand = field.fieldAt(250, 250) !== 0;
 * ```
 */
export class ChargeFieldGenerator implements GridGenerator<number> {
  readonly id = "charge-field";
  readonly config: ChargeFieldConfig;
  readonly width: number;
  readonly height: number;
  readonly charges: readonly Charge[];
  readonly chargeStrength: number;
  /** Mean raw potential times the cutoff multiplier */
  readonly cutoff: number;

  private readonly raw: Grid<number>;
  private readonly field: Grid<number>;

  constructor(input: ChargeFieldConfigInput, options: GeneratorOptions = {}) {
    const config = parseConfig(ChargeFieldConfigSchema, input, "charge field");
    const trace = options.trace ?? new NoOpTraceCollector();
    const chargeCount = config.positiveCharges + config.negativeCharges;

    this.config = config;
    this.width = config.width;
    this.height = config.height;

    if (config.width * config.height * chargeCount > MAX_RECOMMENDED_FIELD_WORK) {
      warnGeneration(
        trace,
        "charge-field",
        `${config.width}x${config.height} with ${chargeCount} charges needs ${config.width * config.height * chargeCount} evaluations`,
      );
    }

    this.charges = traced(trace, "charge-field.place-charges", () =>
      placeCharges(new SeededRandom(config.seed), config),
    );
    this.chargeStrength = computeChargeStrength(
      config.width,
      config.height,
      chargeCount,
    );

    this.raw = traced(trace, "charge-field.sum-potential", () =>
      this.sumPotential(),
    );
    this.cutoff = meanOf(this.raw) * config.cutoffMultiplier;
    this.field = traced(trace, "charge-field.apply-cutoff", () =>
      this.applyCutoff(trace),
    );
  }

  private sumPotential(): Grid<number> {
    const raw = new Grid<number>(this.width, this.height, {
      storage: "f64",
      fill: FIELD_EMPTY,
      outOfBounds: FIELD_EMPTY,
    });
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        raw.setUnsafe(x, y, potentialAt(this.charges, this.chargeStrength, x, y));
      }
    }
    return raw;
  }

  private applyCutoff(trace: TraceCollector): Grid<number> {
    const field = this.raw.clone();
    let kept = 0;

    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (field.getUnsafe(x, y) < this.cutoff) {
          field.setUnsafe(x, y, FIELD_EMPTY);
        } else if (field.getUnsafe(x, y) !== FIELD_EMPTY) {
          kept++;
        }
      }
    }

    const total = this.width * this.height;
    trace.decision(
      "charge-field.apply-cutoff",
      "Cutoff threshold",
      [`mean x ${this.config.cutoffMultiplier}`],
      this.cutoff,
      `${kept}/${total} cells kept (${((kept / total) * 100).toFixed(1)}%)`,
    );
    if (kept === 0) {
      warnGeneration(
        trace,
        "charge-field.apply-cutoff",
        `Cutoff ${this.cutoff} removed every cell; lower cutoffMultiplier (${this.config.cutoffMultiplier})`,
      );
    }

    return field;
  }

  /**
   * Thresholded field, read-only
   */
  get grid(): ReadonlyGrid<number> {
    return this.field;
  }

  /**
   * Field value before the cutoff was applied
   */
  get rawGrid(): ReadonlyGrid<number> {
    return this.raw;
  }

  /**
   * Thresholded value at (x, y); 0 outside the grid
   */
  fieldAt(x: number, y: number): number {
    return this.field.get(x, y);
  }

  /**
   * Raw potential at (x, y); 0 outside the grid
   */
  rawFieldAt(x: number, y: number): number {
    return this.raw.get(x, y);
  }

  checksum(): string {
    const hasher = new FNV64Hasher();
    for (const charge of this.charges) {
      hasher.updateInt32(charge.x).updateInt32(charge.y).updateInt32(charge.polarity);
    }
    return gridChecksum(this.field, hasher);
  }
}

/**
 * Draw charge positions: every positive charge first, then every negative
 * one, each as an x draw followed by a y draw.
 */
function placeCharges(
  rng: SeededRandom,
  config: ChargeFieldConfig,
): readonly Charge[] {
  const total = config.positiveCharges + config.negativeCharges;
  const charges: Charge[] = [];

  for (let i = 0; i < total; i++) {
    const x = rng.range(0, config.width - 1);
    const y = rng.range(0, config.height - 1);
    const polarity: Polarity = i < config.positiveCharges ? 1 : -1;
    charges.push(Object.freeze({ x, y, polarity }));
  }

  return Object.freeze(charges);
}

function meanOf(grid: Grid<number>): number {
  let sum = 0;
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      sum += grid.getUnsafe(x, y);
    }
  }
  return sum / (grid.width * grid.height);
}
