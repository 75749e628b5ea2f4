/**
 * Landmass detection over thresholded charge fields.
 */

import { findConnectedAreas } from "../core/grid/flood-fill";
import type { ConnectedArea, ReadonlyGrid } from "../core/grid/types";
import { FIELD_EMPTY } from "../generators/charge-field/constants";

export interface LandmassOptions {
  /** Landmasses with fewer cells are dropped. Default 1. */
  readonly minSize?: number;
  /** Count diagonal contact as connected. Default false. */
  readonly diagonal?: boolean;
}

/**
 * Connected groups of non-zero field cells, largest first.
 *
 * Read-only: the field is not modified, so small islands can be filtered
 * out for placement logic while the rendered field keeps them.
 */
export function findLandmasses(
  field: { readonly grid: ReadonlyGrid<number> } | ReadonlyGrid<number>,
  options: LandmassOptions = {},
): ConnectedArea[] {
  const grid = "grid" in field ? field.grid : field;
  return findConnectedAreas(grid, (value) => value !== FIELD_EMPTY, {
    minSize: options.minSize ?? 1,
    diagonal: options.diagonal ?? false,
  });
}
