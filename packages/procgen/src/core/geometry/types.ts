/**
 * Core geometry types for procedural generation.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Bounding box defined by inclusive min/max corners
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/**
 * Axis-aligned steps, in the order West, East, North, South
 */
export const DIRECTIONS_4 = [
  { x: -1, y: 0 }, // West
  { x: 1, y: 0 }, // East
  { x: 0, y: -1 }, // North
  { x: 0, y: 1 }, // South
] as const;

/**
 * All eight surrounding steps, row by row from the top-left
 */
export const DIRECTIONS_8 = [
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
  { x: -1, y: 0 }, // W
  { x: 1, y: 0 }, // E
  { x: -1, y: 1 }, // SW
  { x: 0, y: 1 }, // S
  { x: 1, y: 1 }, // SE
] as const;
