/**
 * Simpson Tree Pipeline - Main Orchestrator
 *
 * Pipeline:
 * 1. reverseColumns()     → ColumnSplit (one pair → four columns)
 * 2. nextLayer()          → Layer (every pair of a layer)
 * 3. buildSimpsonTree()   → SimpsonTree (layers 1..k)
 * 4. treeToFractions()    → RationalTree
 * 5. denormalizeTree()    → DenormalizedTree (population N + counts)
 * 6. emitReport()         → string
 */

// Re-export types
export * from './types.js';
export * from './errors.js';

// Re-export individual steps
export { reverseColumns } from './1-reverse-columns.js';
export { nextLayer, groupWidth } from './2-next-layer.js';
export { buildSimpsonTree, getLayer } from './3-build-tree.js';
export { toFraction, columnToFractions, layerToFractions, treeToFractions } from './4-to-fractions.js';
export {
    denormalizeTree,
    computePopulation,
    columnCounts,
    subpopulationLabels,
    orientGroups,
    type PopulationSize
} from './5-denormalize.js';
export { emitReport, emitLayerSection } from './6-emit-report.js';
export {
    validateTreeInput,
    validateReversalConfig,
    validateDenormalizeConfig,
    type ValidationIssue,
    type ValidationResult,
    type IssueSeverity
} from './validation.js';

import { DEFAULT_DENORMALIZE_CONFIG, DenormalizeConfig } from '../../types.js';
import { SimpsonRequest, SimpsonResult } from './types.js';
import { buildSimpsonTree } from './3-build-tree.js';
import { treeToFractions } from './4-to-fractions.js';
import { denormalizeTree } from './5-denormalize.js';
import { emitReport } from './6-emit-report.js';
import { validateDenormalizeConfig } from './validation.js';
import { TreeValidationError } from './errors.js';

/**
 * Run the whole pipeline: build the tree, snap it to fractions,
 * find the smallest population and render the count report.
 */
export function generateSimpsonData(request: SimpsonRequest): SimpsonResult {
    const denormalize: DenormalizeConfig = { ...DEFAULT_DENORMALIZE_CONFIG, ...request.denormalize };

    // Checked before building: deep trees make N too large to report
    const configCheck = validateDenormalizeConfig(denormalize, request.depth);
    if (!configCheck.valid) {
        throw new TreeValidationError(configCheck.issues);
    }

    const tree = buildSimpsonTree({
        firstLayer: request.firstLayer,
        depth: request.depth,
        config: request.reversal,
        maxDepth: request.maxDepth
    });
    const rational = treeToFractions(tree, denormalize.maxDenominator);
    const data = denormalizeTree(rational, denormalize);
    const report = emitReport(data);

    return { tree, rational, data, report };
}
