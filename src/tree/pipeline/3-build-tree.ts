/**
 * Step 3: Build Tree
 *
 * Layer 1 is the caller's root layer (copied). Layer i is nextLayer()
 * of layer i - 1, for i = 2..k. Input is validated up front so a bad
 * root never reaches the splitter; warnings are logged and the build
 * goes on.
 */

import { DEFAULT_REVERSAL_CONFIG, MAX_TREE_DEPTH, ReversalConfig } from '../../types.js';
import { BuildTreeInput, Layer, SimpsonTree } from './types.js';
import { nextLayer } from './2-next-layer.js';
import { validateTreeInput } from './validation.js';
import { TreeValidationError } from './errors.js';

/**
 * Generate a Simpson tree k layers deep.
 */
export function buildSimpsonTree(input: BuildTreeInput): SimpsonTree {
    const { firstLayer, depth } = input;
    const config: ReversalConfig = { ...DEFAULT_REVERSAL_CONFIG, ...input.config };
    const maxDepth = input.maxDepth ?? MAX_TREE_DEPTH;

    const validation = validateTreeInput(firstLayer, depth, config, maxDepth);
    if (!validation.valid) {
        throw new TreeValidationError(validation.issues);
    }
    for (const issue of validation.issues) {
        if (issue.severity === 'warning') {
            console.warn(`Tree input warning: ${issue.message}`);
        }
    }

    const layers: Layer[] = [copyLayer(firstLayer)];

    for (let i = 2; i <= depth; i++) {
        layers.push(nextLayer(layers[i - 2], config));
    }

    return { layers, config };
}

/**
 * Layer k of a tree (1-based).
 */
export function getLayer(tree: SimpsonTree, layerNumber: number): Layer {
    const layer = tree.layers[layerNumber - 1];
    if (!layer) {
        throw new Error(`Layer ${layerNumber} not found (tree has ${tree.layers.length} layers)`);
    }
    return layer;
}

function copyLayer(layer: Layer): Layer {
    return {
        taller: layer.taller.map(col => ({ ...col })),
        shorter: layer.shorter.map(col => ({ ...col }))
    };
}
