/**
 * Step 4: To Fractions
 *
 * Snaps every height and width to the closest fraction whose denominator
 * stays within the configured cap. Lossy on purpose: a float such as
 * 0.6 becomes 3/5 rather than its exact binary value.
 *
 * Traversal follows the model's shape (tree -> layer -> group -> column).
 */

import { Fraction } from '../../fraction.js';
import { DEFAULT_DENORMALIZE_CONFIG } from '../../types.js';
import {
    Column,
    Layer,
    SimpsonTree,
    RationalColumn,
    RationalLayer,
    RationalTree
} from './types.js';

export function toFraction(
    value: number,
    maxDenominator: number = DEFAULT_DENORMALIZE_CONFIG.maxDenominator
): Fraction {
    return Fraction.fromNumber(value).limitDenominator(maxDenominator);
}

export function columnToFractions(column: Column, maxDenominator: number): RationalColumn {
    return {
        height: toFraction(column.height, maxDenominator),
        width: toFraction(column.width, maxDenominator)
    };
}

export function layerToFractions(layer: Layer, maxDenominator: number): RationalLayer {
    return {
        taller: layer.taller.map(col => columnToFractions(col, maxDenominator)),
        shorter: layer.shorter.map(col => columnToFractions(col, maxDenominator))
    };
}

export function treeToFractions(
    tree: SimpsonTree,
    maxDenominator: number = DEFAULT_DENORMALIZE_CONFIG.maxDenominator
): RationalTree {
    return {
        layers: tree.layers.map(layer => layerToFractions(layer, maxDenominator)),
        maxDenominator
    };
}
