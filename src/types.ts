/**
 * Shared configuration types and defaults.
 */

// ==================== REVERSAL CONSTANTS ====================

/**
 * Interpolation constants used when a column pair is split.
 * Must satisfy 0 < a < b < 1 and 0 < c < d < 1 (a/b shape the left
 * columns, c/d the right ones).
 */
export interface ReversalConfig {
    a: number;
    b: number;
    c: number;
    d: number;
}

export const DEFAULT_REVERSAL_CONFIG: ReversalConfig = {
    a: 9 / 20,
    b: 11 / 20,
    c: 9 / 20,
    d: 11 / 20
};

// ==================== DEPTH ====================

/** Default bound on k. Layer k holds 2^(k-1) columns per group. */
export const MAX_TREE_DEPTH = 20;

// ==================== DENORMALIZATION ====================

/**
 * Default bound on the depth of a tree that gets denormalized.
 * N already has thousands of digits at depth 10.
 */
export const MAX_DENORMALIZE_DEPTH = 10;

/**
 * What to do when a reconstructed count is not a whole number,
 * or a layer's group sizes do not add up to the population.
 */
export type PrecisionMode = 'warn' | 'error';

export interface DenormalizeConfig {
    maxDenominator: number;   // Cap for the best rational approximation
    precision: PrecisionMode;
    maxDepth: number;         // Deepest tree that may be turned into counts
}

export const DEFAULT_DENORMALIZE_CONFIG: DenormalizeConfig = {
    maxDenominator: 1_000_000,
    precision: 'warn',
    maxDepth: MAX_DENORMALIZE_DEPTH
};
