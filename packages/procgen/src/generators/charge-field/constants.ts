/**
 * Charge Field Generator Constants
 */

/** Value of a cell below the cutoff, and of queries outside the grid */
export const FIELD_EMPTY = 0;

/** Cell-by-charge evaluations above this get a slow-generation warning */
export const MAX_RECOMMENDED_FIELD_WORK = 2_000_000_000;
