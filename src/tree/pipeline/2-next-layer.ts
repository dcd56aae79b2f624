/**
 * Step 2: Next Layer
 *
 * Applies reverseColumns to every index-aligned (taller[i], shorter[i])
 * pair. Each pair contributes two columns to each new group, in order,
 * so the column count doubles and position i keeps encoding the binary
 * path of the sub-population.
 */

import { ReversalConfig, DEFAULT_REVERSAL_CONFIG } from '../../types.js';
import { Layer, Column } from './types.js';
import { reverseColumns } from './1-reverse-columns.js';

/**
 * Build the layer below `layer`.
 */
export function nextLayer(
    layer: Layer,
    config: ReversalConfig = DEFAULT_REVERSAL_CONFIG
): Layer {
    const { taller, shorter } = layer;

    if (taller.length !== shorter.length) {
        throw new Error(
            `Cannot expand layer with mismatched groups: ${taller.length} taller vs ${shorter.length} shorter`
        );
    }

    const newTaller: Column[] = [];
    const newShorter: Column[] = [];

    for (let i = 0; i < taller.length; i++) {
        const split = reverseColumns(taller[i], shorter[i], config);
        newTaller.push(split.tallLeft, split.tallRight);
        newShorter.push(split.shortLeft, split.shortRight);
    }

    return { taller: newTaller, shorter: newShorter };
}

/**
 * Sum of widths in a group of columns.
 */
export function groupWidth(columns: Column[]): number {
    return columns.reduce((sum, col) => sum + col.width, 0);
}
