/**
 * Error types thrown by the pipeline steps.
 */

import { ValidationIssue } from './validation.js';
import { Column, PrecisionIssue } from './types.js';

/**
 * Root layer, depth or configuration rejected before building starts.
 */
export class TreeValidationError extends Error {
    readonly issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        const errors = issues.filter(i => i.severity === 'error');
        super(`Invalid Simpson tree input: ${errors.map(i => i.message).join('; ')}`);
        this.name = 'TreeValidationError';
        this.issues = issues;
    }
}

/**
 * Column pair that cannot be split (inverted heights, out-of-range values,
 * or a split that would produce non-finite columns).
 */
export class ColumnOrderError extends Error {
    readonly tall: Column;
    readonly short: Column;

    constructor(message: string, tall: Column, short: Column) {
        super(message);
        this.name = 'ColumnOrderError';
        this.tall = tall;
        this.short = short;
    }
}

/**
 * Reconstructed counts are not whole numbers, or do not add up to the
 * population. Only thrown in 'error' precision mode.
 */
export class PrecisionLossError extends Error {
    readonly issues: PrecisionIssue[];

    constructor(issues: PrecisionIssue[]) {
        super(`Precision lost while denormalizing: ${issues.map(i => i.message).join('; ')}`);
        this.name = 'PrecisionLossError';
        this.issues = issues;
    }
}
