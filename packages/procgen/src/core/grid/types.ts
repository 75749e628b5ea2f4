/**
 * Grid types for procedural generation.
 */

import type { Bounds, Point } from "../geometry/types";

/**
 * Typed-array backing of a grid.
 *
 * - `u8`: small enumerations (walk tiles)
 * - `i32`: signed ids (region ids, with negative sentinels)
 * - `f64`: continuous values (field magnitudes)
 */
export type GridStorageKind = "u8" | "i32" | "f64";

export type GridStorage = Uint8Array | Int32Array | Float64Array;

export interface GridOptions<T extends number> {
  readonly storage: GridStorageKind;
  /** Value every cell starts with */
  readonly fill: T;
  /** Value `get` returns for coordinates outside the grid */
  readonly outOfBounds: T;
}

/**
 * Connected set of cells found by flood fill
 */
export interface ConnectedArea {
  readonly id: number;
  readonly points: readonly Point[];
  readonly bounds: Bounds;
  readonly size: number;
}

/**
 * Flood fill configuration
 */
export interface FloodFillConfig {
  /** Count diagonal contact as connected */
  readonly diagonal?: boolean;
}

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Generators hand this type to callers so the grid they own cannot be
 * written from outside.
 *
 * @example
 * ```typescript
 * function countFloors(grid: ReadonlyGrid<WalkTile>): number {
 *   return grid.countCells(WalkTile.FLOOR);
 * }
 * ```
 */
export interface ReadonlyGrid<T extends number = number> {
  readonly width: number;
  readonly height: number;
  readonly outOfBounds: T;

  isInBounds(x: number, y: number): boolean;

  get(x: number, y: number): T;
  getUnsafe(x: number, y: number): T;

  countNeighbors8(x: number, y: number, target: T): number;
  forEachNeighbor4(
    x: number,
    y: number,
    callback: (nx: number, ny: number, value: T) => void,
  ): void;
  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, value: T) => void,
  ): void;

  getRawDataCopy(): GridStorage;
  forEach(callback: (x: number, y: number, value: T) => void): void;
  countCells(value: T): number;
  /** Detached mutable copy */
  clone(): MutableGrid<T>;
}

/**
 * Mutable grid interface. Only the owning generator sees this type.
 */
export interface MutableGrid<T extends number = number> extends ReadonlyGrid<T> {
  set(x: number, y: number, value: T): void;
  setUnsafe(x: number, y: number, value: T): void;
}
