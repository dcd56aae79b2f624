/**
 * Step 1: Reverse Columns
 *
 * Splits a (tall, short) column pair into four columns so that the
 * comparison flips one level down:
 * - tallLeft vs shortLeft: both above the tall parent, tallLeft higher
 * - tallRight vs shortRight: both below the short parent, tallRight higher
 *
 * The new taller columns are cut out of the SHORT parent's width and the
 * new shorter columns out of the TALL parent's width, so each parent's
 * area (height * width) is conserved while the aggregate order reverses.
 */

import { ReversalConfig, DEFAULT_REVERSAL_CONFIG } from '../../types.js';
import { Column, ColumnSplit } from './types.js';
import { ColumnOrderError } from './errors.js';
import { isOpenUnit } from './validation.js';

/**
 * Split one column pair.
 * Throws ColumnOrderError unless tall.height > short.height, both heights
 * lie in (0, 1) and both widths are positive.
 */
export function reverseColumns(
    tall: Column,
    short: Column,
    config: ReversalConfig = DEFAULT_REVERSAL_CONFIG
): ColumnSplit {
    assertSplittable(tall, short);

    const { a, b, c, d } = config;
    const { height: hT, width: wT } = tall;
    const { height: hS, width: wS } = short;

    // Heights of the new columns
    const hTallLeft = hT + a * (1 - hT);
    const hShortLeft = hT + b * (1 - hT);
    const hTallRight = c * hS;
    const hShortRight = d * hS;

    // Where along each parent's width to cut
    const zT = (hT - c * hS) / ((1 - a) * hT + a - c * hS);
    const zS = (hS - d * hS) / ((1 - b) * hT + b - d * hS);

    const split: ColumnSplit = {
        tallLeft: { height: hShortLeft, width: zS * wS },
        tallRight: { height: hShortRight, width: (1 - zS) * wS },
        shortLeft: { height: hTallLeft, width: zT * wT },
        shortRight: { height: hTallRight, width: (1 - zT) * wT }
    };

    for (const col of Object.values(split)) {
        if (!Number.isFinite(col.height) || !Number.isFinite(col.width)) {
            throw new ColumnOrderError(
                `Split produced a non-finite column (${col.height}, ${col.width})`,
                tall,
                short
            );
        }
    }

    return split;
}

function assertSplittable(tall: Column, short: Column): void {
    if (!isOpenUnit(tall.height) || !isOpenUnit(short.height)) {
        throw new ColumnOrderError(
            `Heights must lie strictly between 0 and 1 (tall=${tall.height}, short=${short.height})`,
            tall,
            short
        );
    }
    if (!(tall.width > 0) || !(short.width > 0) || !Number.isFinite(tall.width) || !Number.isFinite(short.width)) {
        throw new ColumnOrderError(
            `Widths must be positive (tall=${tall.width}, short=${short.width})`,
            tall,
            short
        );
    }
    if (!(tall.height > short.height)) {
        throw new ColumnOrderError(
            `Tall column height ${tall.height} is not above short column height ${short.height}`,
            tall,
            short
        );
    }
}
