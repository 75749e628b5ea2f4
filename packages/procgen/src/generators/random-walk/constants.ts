/**
 * Random Walk Generator Constants
 */

export {
  BASIC_INTERSECTION,
  FULL_INTERSECTION,
  NO_INTERSECTION,
  UNLIMITED_STEPS,
} from "@tilegen/contracts";

/**
 * Tri-state walk tile
 */
export const WalkTile = {
  EMPTY: 0,
  FLOOR: 1,
  WALL: 2,
} as const;

export type WalkTile = (typeof WalkTile)[keyof typeof WalkTile];
