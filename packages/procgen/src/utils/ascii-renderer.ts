/**
 * ASCII Map Renderer
 *
 * Renders generated grids as text for debugging, previews and tests.
 *
 * @example
 * ```typescript
 * const walk = generateRandomWalkMap({ seed: 7, width: 60, height: 30 });
 * console.log(renderWalkAscii(walk.grid, { markers: [walk.cursor] }));
 * ```
 */

import type { Point } from "../core/geometry/types";
import type { ReadonlyGrid } from "../core/grid/types";
import { FIELD_EMPTY } from "../generators/charge-field/constants";
import { WalkTile } from "../generators/random-walk/constants";
import type { Region } from "../generators/region-growth/region";
import { REGION_UNCLAIMED } from "../generators/region-growth/region";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Characters for each kind of cell
 */
export interface AsciiCharset {
  readonly empty: string;
  readonly floor: string;
  readonly wall: string;
  readonly land: string;
  readonly water: string;
  readonly marker: string;
  /** Region ids cycle through these */
  readonly regions: string;
  readonly unclaimed: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  empty: " ",
  floor: "·",
  wall: "█",
  land: "▓",
  water: "░",
  marker: "@",
  regions: "123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  unclaimed: "?",
};

/**
 * Plain ASCII for terminals without unicode support
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  empty: " ",
  floor: ".",
  wall: "#",
  land: "#",
  water: "~",
  marker: "@",
  regions: "123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  unclaimed: "?",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Cells drawn with `charset.marker` on top of the map */
  readonly markers?: readonly Point[];
  /** Prefix rows with their y coordinate and add an x ruler */
  readonly showCoordinates?: boolean;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render any grid through a per-cell character mapping
 */
export function renderGridAscii<T extends number>(
  grid: ReadonlyGrid<T>,
  toChar: (value: T, x: number, y: number) => string,
  options: RenderOptions = {},
): string {
  const { charset = DEFAULT_CHARSET, markers = [], showCoordinates = false } =
    options;

  const rows: string[][] = [];
  for (let y = 0; y < grid.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < grid.width; x++) {
      row.push(toChar(grid.getUnsafe(x, y), x, y));
    }
    rows.push(row);
  }

  for (const marker of markers) {
    const row = rows[marker.y];
    if (row && marker.x >= 0 && marker.x < grid.width) {
      row[marker.x] = charset.marker;
    }
  }

  const lines: string[] = [];

  if (showCoordinates) {
    let ruler = "    ";
    for (let x = 0; x < grid.width; x += 10) {
      ruler += x.toString().padEnd(10);
    }
    lines.push(ruler.trimEnd());
  }

  rows.forEach((row, y) => {
    const prefix = showCoordinates ? `${y.toString().padStart(3)} ` : "";
    lines.push(prefix + row.join(""));
  });

  return lines.join("\n");
}

/**
 * Render random-walk tiles
 */
export function renderWalkAscii(
  grid: ReadonlyGrid<WalkTile>,
  options: RenderOptions = {},
): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  return renderGridAscii(
    grid,
    (tile) => {
      switch (tile) {
        case WalkTile.FLOOR:
          return charset.floor;
        case WalkTile.WALL:
          return charset.wall;
        default:
          return charset.empty;
      }
    },
    options,
  );
}

/**
 * Render a thresholded charge field as land and water
 */
export function renderFieldAscii(
  grid: ReadonlyGrid<number>,
  options: RenderOptions = {},
): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  return renderGridAscii(
    grid,
    (value) => (value !== FIELD_EMPTY ? charset.land : charset.water),
    options,
  );
}

/**
 * Render a region id grid, one character per id.
 * Ids past the end of `charset.regions` wrap around.
 */
export function renderRegionsAscii(
  grid: ReadonlyGrid<number>,
  options: RenderOptions & { readonly regions?: readonly Region[] } = {},
): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  const palette = charset.regions;
  const origins = options.regions?.map((region) => region.origin) ?? [];

  return renderGridAscii(
    grid,
    (id) => {
      if (id <= REGION_UNCLAIMED || palette.length === 0) {
        return charset.unclaimed;
      }
      return palette[(id - 1) % palette.length] ?? charset.unclaimed;
    },
    { ...options, markers: [...(options.markers ?? []), ...origins] },
  );
}

