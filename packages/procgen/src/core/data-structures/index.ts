/**
 * Data structures shared by the grid algorithms
 */

export { CoordSet, FastQueue } from "./fast-queue";
