/**
 * @file constants.ts
 * @description Shared numeric constants for classification, elimination and root finding.
 */

/**
 * Relative tolerance for comparing constants: two values are equal when they
 * lie within EPSILON of each other, relative to their magnitude.
 */
export const EPSILON = 1e-10;

/**
 * How far a random unit substitution factor may stray from 1.0 (absolute).
 */
export const RAND_RANGE = 0.2;

/**
 * A coefficient merge that cancels to within this fraction of the merged
 * magnitudes is treated as exactly zero.
 */
export const CANCEL_TOLERANCE = 1e-12;

// Two real roots closer than this (relative) are the same root
export const ROOT_TOLERANCE = 1e-9;

export const MAX_BISECTION_STEPS = 200;

// Integer powers of multi-term polynomials are expanded only up to this exponent
export const MAX_EXPANSION_POWER = 32;

export const MAX_SOLVER_DEPTH = 500;
export const MAX_ELIMINATION_DEPTH = 200;

// Attempts to draw a substitution factor that is not within EPSILON of an earlier one
export const MAX_SUBSTITUTION_DRAWS = 1000;
