/**
 * Flood fill over typed grids, for connectivity analysis of generated maps.
 */

import { CoordSet, FastQueue } from "../data-structures";
import type { Bounds, Point } from "../geometry/types";
import type { ConnectedArea, FloodFillConfig, ReadonlyGrid } from "./types";

export type CellPredicate<T extends number> = (value: T) => boolean;

export interface ConnectedAreaConfig extends FloodFillConfig {
  /** Areas smaller than this are left out of the result */
  readonly minSize?: number;
}

function fillFrom<T extends number>(
  grid: ReadonlyGrid<T>,
  startX: number,
  startY: number,
  match: CellPredicate<T>,
  visited: CoordSet,
  diagonal: boolean,
): Point[] {
  const points: Point[] = [];
  const queue = new FastQueue<Point>();

  visited.add(startX, startY);
  queue.enqueue({ x: startX, y: startY });

  const visit = (nx: number, ny: number, value: T): void => {
    if (visited.has(nx, ny) || !match(value)) return;
    visited.add(nx, ny);
    queue.enqueue({ x: nx, y: ny });
  };

  while (!queue.isEmpty) {
    const current = queue.dequeue();
    if (!current) break;
    points.push(current);

    if (diagonal) {
      grid.forEachNeighbor8(current.x, current.y, visit);
    } else {
      grid.forEachNeighbor4(current.x, current.y, visit);
    }
  }

  return points;
}

export function boundsOf(points: readonly Point[]): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }

  return { minX, minY, maxX, maxY };
}

/**
 * Every connected area of matching cells, largest first.
 *
 * Ids follow row-major discovery order, so an area keeps its id whatever
 * its rank in the sorted result. Equal sizes keep discovery order.
 */
export function findConnectedAreas<T extends number>(
  grid: ReadonlyGrid<T>,
  match: CellPredicate<T>,
  config: ConnectedAreaConfig = {},
): ConnectedArea[] {
  const { minSize = 1, diagonal = false } = config;
  const visited = new CoordSet(grid.width, grid.height);
  const areas: ConnectedArea[] = [];
  let nextId = 1;

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (visited.has(x, y) || !match(grid.getUnsafe(x, y))) continue;

      const points = fillFrom(grid, x, y, match, visited, diagonal);
      const id = nextId++;
      if (points.length < minSize) continue;

      areas.push({
        id,
        points,
        bounds: boundsOf(points),
        size: points.length,
      });
    }
  }

  return areas.sort((a, b) => b.size - a.size);
}
