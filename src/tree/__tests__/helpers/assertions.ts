/**
 * Invariant assertions shared by the tree tests.
 * Each throws with a descriptive message on the first violation.
 */

import { SimpsonTree, Layer } from '../../pipeline/types.js';
import { groupWidth } from '../../pipeline/2-next-layer.js';

export const WIDTH_TOLERANCE = 1e-9;

/**
 * taller[i].height > shorter[i].height for every index of every layer.
 */
export function assertStrictDominance(tree: SimpsonTree): void {
    tree.layers.forEach((layer, index) => {
        if (layer.taller.length !== layer.shorter.length) {
            throw new Error(
                `Layer ${index + 1}: group lengths differ (${layer.taller.length} vs ${layer.shorter.length})`
            );
        }
        layer.taller.forEach((tall, i) => {
            const short = layer.shorter[i];
            if (!(tall.height > short.height)) {
                throw new Error(
                    `Layer ${index + 1}, column ${i}: taller ${tall.height} is not above shorter ${short.height}`
                );
            }
        });
    });
}

/**
 * The new taller group is as wide as the old shorter group and vice versa.
 */
export function assertWidthConservation(previous: Layer, next: Layer): void {
    const checks: Array<[string, number, number]> = [
        ['new taller vs old shorter', groupWidth(next.taller), groupWidth(previous.shorter)],
        ['new shorter vs old taller', groupWidth(next.shorter), groupWidth(previous.taller)]
    ];
    for (const [name, actual, expected] of checks) {
        if (Math.abs(actual - expected) > WIDTH_TOLERANCE) {
            throw new Error(`Width not conserved (${name}): ${actual} vs ${expected}`);
        }
    }
}

/**
 * Every height and width of every layer lies strictly inside (0, 1).
 */
export function assertUnitRange(tree: SimpsonTree): void {
    tree.layers.forEach((layer, index) => {
        for (const col of [...layer.taller, ...layer.shorter]) {
            if (!(col.height > 0 && col.height < 1 && col.width > 0 && col.width < 1)) {
                throw new Error(`Layer ${index + 1}: column out of range (${col.height}, ${col.width})`);
            }
        }
    });
}
