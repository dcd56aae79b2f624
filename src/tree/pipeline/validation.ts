/**
 * Input Validation
 *
 * Checks run before any column is split:
 * 1. Reversal constants inside (0, 1) with a < b and c < d
 * 2. Root layer groups non-empty and of equal length
 * 3. Heights and widths finite and strictly inside (0, 1)
 * 4. Each taller column strictly above its sibling
 * 5. Depth an integer in [1, maxDepth]
 *
 * Root widths that do not sum to 1 are reported as a warning only.
 */

import { ReversalConfig, DenormalizeConfig, MAX_TREE_DEPTH } from '../../types.js';
import { Column, Layer } from './types.js';

// ==================== ISSUE TYPES ====================

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ValidationIssue {
    id: string;
    severity: IssueSeverity;
    type: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    issues: ValidationIssue[];
    stats: {
        errors: number;
        warnings: number;
        infos: number;
    };
}

type AddIssue = (severity: IssueSeverity, type: string, message: string) => void;

const WIDTH_SUM_TOLERANCE = 1e-9;

// ==================== VALIDATION FUNCTIONS ====================

/**
 * Validate everything a tree build depends on.
 */
export function validateTreeInput(
    firstLayer: Layer,
    depth: number,
    config: ReversalConfig,
    maxDepth: number = MAX_TREE_DEPTH
): ValidationResult {
    return collectIssues(addIssue => {
        checkReversalConfig(config, addIssue);
        checkRootLayer(firstLayer, addIssue);
        checkDepth(depth, maxDepth, addIssue);
    });
}

/**
 * Validate reversal constants on their own.
 */
export function validateReversalConfig(config: ReversalConfig): ValidationResult {
    return collectIssues(addIssue => checkReversalConfig(config, addIssue));
}

/**
 * Validate denormalization settings. With `depth`, also checks that a tree
 * that deep may be denormalized.
 */
export function validateDenormalizeConfig(config: DenormalizeConfig, depth?: number): ValidationResult {
    return collectIssues(addIssue => {
        if (!Number.isSafeInteger(config.maxDenominator) || config.maxDenominator < 1) {
            addIssue(
                'error',
                'max-denominator',
                `maxDenominator must be a positive integer, got ${config.maxDenominator}`
            );
        }
        if (config.precision !== 'warn' && config.precision !== 'error') {
            addIssue('error', 'precision-mode', `Unknown precision mode: ${String(config.precision)}`);
        }
        if (!Number.isInteger(config.maxDepth) || config.maxDepth < 1) {
            addIssue('error', 'max-depth', `Denormalize maxDepth must be a positive integer, got ${config.maxDepth}`);
        } else if (depth !== undefined && depth > config.maxDepth) {
            addIssue(
                'error',
                'denormalize-depth-limit',
                `Depth ${depth} exceeds the denormalization maximum of ${config.maxDepth}`
            );
        }
    });
}

function collectIssues(run: (addIssue: AddIssue) => void): ValidationResult {
    const issues: ValidationIssue[] = [];
    let issueId = 0;

    run((severity, type, message) => {
        issues.push({
            id: `issue_${++issueId}`,
            severity,
            type,
            message
        });
    });

    const stats = {
        errors: issues.filter(i => i.severity === 'error').length,
        warnings: issues.filter(i => i.severity === 'warning').length,
        infos: issues.filter(i => i.severity === 'info').length
    };

    return {
        valid: stats.errors === 0,
        issues,
        stats
    };
}

// ==================== CHECK: CONFIG ====================

function checkReversalConfig(config: ReversalConfig, addIssue: AddIssue): void {
    for (const key of ['a', 'b', 'c', 'd'] as const) {
        const value = config[key];
        if (!isOpenUnit(value)) {
            addIssue('error', 'constant-range', `Constant ${key} must lie strictly between 0 and 1, got ${value}`);
        }
    }
    if (!(config.a < config.b)) {
        addIssue('error', 'constant-order', `Constant a (${config.a}) must be less than b (${config.b})`);
    }
    if (!(config.c < config.d)) {
        addIssue('error', 'constant-order', `Constant c (${config.c}) must be less than d (${config.d})`);
    }
}

// ==================== CHECK: ROOT LAYER ====================

function checkRootLayer(layer: Layer, addIssue: AddIssue): void {
    const { taller, shorter } = layer;

    if (taller.length === 0 || shorter.length === 0) {
        addIssue('error', 'empty-group', 'Both groups of the first layer need at least one column');
        return;
    }
    if (taller.length !== shorter.length) {
        addIssue(
            'error',
            'group-length',
            `Group lengths differ: ${taller.length} taller vs ${shorter.length} shorter columns`
        );
        return;
    }

    taller.forEach((col, i) => checkColumn(col, `taller[${i}]`, addIssue));
    shorter.forEach((col, i) => checkColumn(col, `shorter[${i}]`, addIssue));

    for (let i = 0; i < taller.length; i++) {
        if (!(taller[i].height > shorter[i].height)) {
            addIssue(
                'error',
                'inverted-order',
                `taller[${i}] height ${taller[i].height} is not above shorter[${i}] height ${shorter[i].height}`
            );
        }
    }

    const widthSum = [...taller, ...shorter].reduce((sum, col) => sum + col.width, 0);
    if (Math.abs(widthSum - 1) > WIDTH_SUM_TOLERANCE) {
        addIssue('warning', 'width-sum', `Root widths sum to ${widthSum}, not 1`);
    }
}

function checkColumn(col: Column, name: string, addIssue: AddIssue): void {
    if (!isOpenUnit(col.height)) {
        addIssue('error', 'height-range', `${name} height must lie strictly between 0 and 1, got ${col.height}`);
    }
    if (!isOpenUnit(col.width)) {
        addIssue('error', 'width-range', `${name} width must lie strictly between 0 and 1, got ${col.width}`);
    }
}

// ==================== CHECK: DEPTH ====================

function checkDepth(depth: number, maxDepth: number, addIssue: AddIssue): void {
    if (!Number.isInteger(depth) || depth < 1) {
        addIssue('error', 'depth', `Depth must be a positive integer, got ${depth}`);
    } else if (depth > maxDepth) {
        addIssue('error', 'depth-limit', `Depth ${depth} exceeds the maximum of ${maxDepth}`);
    }
}

// ==================== HELPERS ====================

export function isOpenUnit(value: number): boolean {
    return Number.isFinite(value) && value > 0 && value < 1;
}
