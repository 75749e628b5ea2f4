/**
 * Typed-array grid for procedural generation.
 *
 * One class covers every generator: the storage kind picks the typed array,
 * and the out-of-bounds value lets boundary logic treat the outside of the
 * map as a known cell instead of an error.
 */

import { GenerationError } from "@tilegen/contracts";
import { DIRECTIONS_8 } from "../geometry/types";
import type {
  GridOptions,
  GridStorage,
  GridStorageKind,
  MutableGrid,
} from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

function allocate(kind: GridStorageKind, size: number): GridStorage {
  switch (kind) {
    case "u8":
      return new Uint8Array(size);
    case "i32":
      return new Int32Array(size);
    case "f64":
      return new Float64Array(size);
  }
}

/**
 * 2D grid stored row-major in a single typed array.
 *
 * @remarks
 * The class is internally mutable. Generators keep the `Grid` and expose it
 * as `ReadonlyGrid<T>`; only the owner writes cells.
 */
export class Grid<T extends number = number> implements MutableGrid<T> {
  readonly width: number;
  readonly height: number;
  readonly outOfBounds: T;
  readonly storage: GridStorageKind;
  private readonly data: GridStorage;

  constructor(width: number, height: number, options: GridOptions<T>) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw GenerationError.configInvalid(
        `Invalid grid dimensions: ${width}x${height}`,
        { width, height },
      );
    }

    this.width = width;
    this.height = height;
    this.outOfBounds = options.outOfBounds;
    this.storage = options.storage;
    this.data = allocate(options.storage, width * height);

    if (options.fill !== 0) {
      this.data.fill(options.fill);
    }
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  /**
   * True for integer coordinates inside the grid
   */
  isInBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Cell value, or the out-of-bounds value outside the grid
   */
  get(x: number, y: number): T {
    if (!this.isInBounds(x, y)) return this.outOfBounds;
    return this.data[y * this.width + x] as T;
  }

  /**
   * Set a cell; writes outside the grid are dropped
   */
  set(x: number, y: number, value: T): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `Grid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = value;
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(x: number, y: number): T {
    return this.data[y * this.width + x] as T;
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(x: number, y: number, value: T): void {
    this.data[y * this.width + x] = value;
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Count the 8 surrounding cells equal to `target`.
   * Cells outside the grid count as the out-of-bounds value.
   */
  countNeighbors8(x: number, y: number, target: T): number {
    let count = 0;

    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;

      if (nx >= 0 && nx < this.width && ny >= 0 && ny < this.height) {
        if (this.data[ny * this.width + nx] === target) count++;
      } else if (this.outOfBounds === target) {
        count++;
      }
    }

    return count;
  }

  /**
   * Iterate over in-bounds 4-directional neighbors without allocation
   */
  forEachNeighbor4(
    x: number,
    y: number,
    callback: (nx: number, ny: number, value: T) => void,
  ): void {
    if (x > 0) callback(x - 1, y, this.getUnsafe(x - 1, y));
    if (x < this.width - 1) callback(x + 1, y, this.getUnsafe(x + 1, y));
    if (y > 0) callback(x, y - 1, this.getUnsafe(x, y - 1));
    if (y < this.height - 1) callback(x, y + 1, this.getUnsafe(x, y + 1));
  }

  /**
   * Iterate over in-bounds 8-directional neighbors without allocation
   */
  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, value: T) => void,
  ): void {
    const minX = Math.max(0, x - 1);
    const maxX = Math.min(this.width - 1, x + 1);
    const minY = Math.max(0, y - 1);
    const maxY = Math.min(this.height - 1, y + 1);

    for (let ny = minY; ny <= maxY; ny++) {
      for (let nx = minX; nx <= maxX; nx++) {
        if (nx !== x || ny !== y) {
          callback(nx, ny, this.getUnsafe(nx, ny));
        }
      }
    }
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): Grid<T> {
    const result = new Grid<T>(this.width, this.height, {
      storage: this.storage,
      fill: this.outOfBounds,
      outOfBounds: this.outOfBounds,
    });
    result.data.set(this.data);
    return result;
  }

  /**
   * Copy of the backing array, safe to hand to renderers and hashers
   */
  getRawDataCopy(): GridStorage {
    return this.data.slice();
  }

  forEach(callback: (x: number, y: number, value: T) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.getUnsafe(x, y));
      }
    }
  }

  countCells(value: T): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === value) count++;
    }
    return count;
  }
}
