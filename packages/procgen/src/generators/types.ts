/**
 * Shared generator contracts.
 */

import type { ReadonlyGrid } from "../core/grid/types";
import type { TraceCollector } from "../trace/types";

export interface GeneratorOptions {
  /** Receives phase timings, decisions and warnings. Defaults to a no-op. */
  readonly trace?: TraceCollector;
}

/**
 * Common surface of every generator: an owned grid exposed read-only.
 */
export interface GridGenerator<T extends number = number> {
  readonly id: string;
  readonly width: number;
  readonly height: number;
  readonly grid: ReadonlyGrid<T>;
  /** Versioned hash of the grid (and any auxiliary state) */
  checksum(): string;
}
