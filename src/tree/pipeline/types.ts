/**
 * Simpson Tree Pipeline Types
 * Type definitions for the 6-step generation pipeline.
 *
 * Layer numbering is 1-based everywhere it is exposed (`layer: 1` is the
 * root). SimpsonTree.layers stores layer k at index k - 1.
 */

import { Fraction } from '../../fraction.js';
import { ReversalConfig, DenormalizeConfig } from '../../types.js';

// ==================== BRANDED TYPES ====================

/**
 * Binary path of a sub-population, e.g. "01" (left, then right).
 * Layer k uses labels of length k - 1; the root has the empty label.
 */
export type SubpopulationLabel = string & { readonly __brand: 'SubpopulationLabel' };

/** Helper to create a SubpopulationLabel from string */
export function toSubpopulationLabel(label: string): SubpopulationLabel {
    return label as SubpopulationLabel;
}

// ==================== FLOAT MODEL ====================

/**
 * Column - a sub-population drawn as a bar.
 * height = recovery rate, width = share of the whole population.
 */
export interface Column {
    height: number;
    width: number;
}

/**
 * Layer - two index-aligned groups. taller[i] and shorter[i] are siblings
 * split from the same ancestor pair, and taller[i].height > shorter[i].height.
 */
export interface Layer {
    taller: Column[];
    shorter: Column[];
}

/**
 * SimpsonTree - layers 1..k. Built once, never mutated.
 */
export interface SimpsonTree {
    layers: Layer[];
    config: ReversalConfig;
}

// ==================== STEP 1: REVERSE COLUMNS ====================

/**
 * The four columns produced from one (tall, short) pair.
 * tallLeft/tallRight come out of the short parent's width,
 * shortLeft/shortRight out of the tall parent's width.
 */
export interface ColumnSplit {
    tallLeft: Column;
    tallRight: Column;
    shortLeft: Column;
    shortRight: Column;
}

// ==================== STEP 3: BUILD TREE ====================

export interface BuildTreeInput {
    firstLayer: Layer;
    depth: number;                      // k, number of layers to generate
    config?: Partial<ReversalConfig>;
    maxDepth?: number;                  // Defaults to MAX_TREE_DEPTH
}

// ==================== STEP 4: TO FRACTIONS ====================

export interface RationalColumn {
    height: Fraction;
    width: Fraction;
}

export interface RationalLayer {
    taller: RationalColumn[];
    shorter: RationalColumn[];
}

export interface RationalTree {
    layers: RationalLayer[];
    maxDenominator: number;
}

// ==================== STEP 5: DENORMALIZE ====================

/**
 * Group roles after the even-layer swap.
 * Treatment is the taller group of layer 1.
 */
export type GroupRole = 'treatment' | 'control';

/**
 * A layer's groups in treatment/control order instead of taller/shorter.
 */
export interface OrientedGroups<T> {
    treatment: T[];
    control: T[];
}

/**
 * Counts for one sub-population in one group.
 * Both values are whole numbers unless precision was lost.
 */
export interface SubpopulationCount {
    label: SubpopulationLabel;
    recovered: Fraction;
    groupSize: Fraction;
}

export interface DenormalizedLayer {
    layer: number;                      // 1-based
    labels: SubpopulationLabel[];
    treatment: SubpopulationCount[];
    control: SubpopulationCount[];
    total: Fraction;                    // Sum of all group sizes, equals population when exact
}

/**
 * Precision problem found while reconstructing counts.
 */
export interface PrecisionIssue {
    layer: number;
    label: SubpopulationLabel | null;   // null for layer-wide problems
    role: GroupRole | null;
    message: string;
}

export interface DenormalizedTree {
    population: bigint;                 // N = heightMultiplier * widthMultiplier
    heightMultiplier: bigint;
    widthMultiplier: bigint;
    layers: DenormalizedLayer[];
    precisionIssues: PrecisionIssue[];
}

// ==================== PIPELINE ====================

/**
 * Input for a full run: root layer and depth through to the text report.
 */
export interface SimpsonRequest {
    firstLayer: Layer;
    depth: number;
    reversal?: Partial<ReversalConfig>;
    denormalize?: Partial<DenormalizeConfig>;
    maxDepth?: number;
}

export interface SimpsonResult {
    tree: SimpsonTree;
    rational: RationalTree;
    data: DenormalizedTree;
    report: string;
}
