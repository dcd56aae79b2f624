/**
 * Step 5: Denormalize
 *
 * Turns the rational tree into head counts:
 * - heightMultiplier = lcm of every height denominator
 * - widthMultiplier  = lcm of every width denominator
 * - population N     = heightMultiplier * widthMultiplier
 * - per column: groupSize = width * N, recovered = height * width * N
 *
 * Trees deeper than DenormalizeConfig.maxDepth are rejected up front.
 *
 * N is the smallest population for which every snapped proportion gives
 * whole people. Any count that is still fractional, or a layer whose
 * group sizes do not add up to N, is a precision issue: logged in 'warn'
 * mode, thrown as PrecisionLossError in 'error' mode. Counts are never
 * rounded.
 *
 * Group order: nextLayer() always emits the columns cut from the shorter
 * parent first, so on even layers the treatment group sits in the
 * shorter slot. orientGroups() undoes that so treatment stays treatment.
 */

import { Fraction, lcm } from '../../fraction.js';
import { DenormalizeConfig, DEFAULT_DENORMALIZE_CONFIG } from '../../types.js';
import {
    RationalTree,
    RationalColumn,
    DenormalizedTree,
    DenormalizedLayer,
    SubpopulationCount,
    SubpopulationLabel,
    PrecisionIssue,
    OrientedGroups,
    GroupRole,
    toSubpopulationLabel
} from './types.js';
import { PrecisionLossError, TreeValidationError } from './errors.js';
import { validateDenormalizeConfig } from './validation.js';

// ==================== LABELS & ORDER ====================

/**
 * All binary strings of length k - 1 in lexicographic order.
 * Layer 1 -> [""], layer 3 -> ["00", "01", "10", "11"].
 *
 * With more than one root column pair every label is prefixed by the
 * index of the root pair it descends from: "1.01", or just "1" on layer 1.
 */
export function subpopulationLabels(
    layerNumber: number,
    rootColumns: number = 1
): SubpopulationLabel[] {
    const bits = layerNumber - 1;
    if (!Number.isInteger(bits) || bits < 0) {
        throw new Error(`Invalid layer number: ${layerNumber}`);
    }
    if (!Number.isInteger(rootColumns) || rootColumns < 1) {
        throw new Error(`Invalid root column count: ${rootColumns}`);
    }

    const paths: string[] = [];
    for (let i = 0; i < 2 ** bits; i++) {
        paths.push(bits === 0 ? '' : i.toString(2).padStart(bits, '0'));
    }

    if (rootColumns === 1) {
        return paths.map(toSubpopulationLabel);
    }

    const labels: SubpopulationLabel[] = [];
    for (let root = 0; root < rootColumns; root++) {
        for (const path of paths) {
            labels.push(toSubpopulationLabel(path === '' ? `${root}` : `${root}.${path}`));
        }
    }
    return labels;
}

/**
 * Map a layer's [taller, shorter] groups to treatment/control.
 * Treatment is group (k + 1) % 2, control is group k % 2, so odd layers
 * keep their order and even layers swap.
 */
export function orientGroups<T>(
    layer: { taller: T[]; shorter: T[] },
    layerNumber: number
): OrientedGroups<T> {
    const groups = [layer.taller, layer.shorter];
    return {
        treatment: groups[(layerNumber + 1) % 2],
        control: groups[layerNumber % 2]
    };
}

// ==================== POPULATION ====================

export interface PopulationSize {
    population: bigint;
    heightMultiplier: bigint;
    widthMultiplier: bigint;
}

/**
 * Smallest population consistent with every layer of the tree.
 */
export function computePopulation(tree: RationalTree): PopulationSize {
    const heightDenominators: bigint[] = [];
    const widthDenominators: bigint[] = [];

    for (const layer of tree.layers) {
        for (const col of [...layer.taller, ...layer.shorter]) {
            heightDenominators.push(col.height.denominator);
            widthDenominators.push(col.width.denominator);
        }
    }

    const heightMultiplier = lcm(heightDenominators);
    const widthMultiplier = lcm(widthDenominators);

    return {
        population: heightMultiplier * widthMultiplier,
        heightMultiplier,
        widthMultiplier
    };
}

/**
 * Counts for a single column in a population of `population` people.
 */
export function columnCounts(
    column: RationalColumn,
    label: SubpopulationLabel,
    population: bigint
): SubpopulationCount {
    const n = Fraction.of(population);
    const groupSize = column.width.mul(n);
    return {
        label,
        recovered: column.height.mul(groupSize),
        groupSize
    };
}

// ==================== DENORMALIZE ====================

/**
 * Denormalize a rational tree into per-layer, per-group counts.
 */
export function denormalizeTree(
    tree: RationalTree,
    config: Partial<DenormalizeConfig> = {}
): DenormalizedTree {
    const merged: DenormalizeConfig = { ...DEFAULT_DENORMALIZE_CONFIG, ...config };
    const configCheck = validateDenormalizeConfig(merged, tree.layers.length);
    if (!configCheck.valid) {
        throw new TreeValidationError(configCheck.issues);
    }
    const { precision } = merged;
    const { population, heightMultiplier, widthMultiplier } = computePopulation(tree);
    const populationFraction = Fraction.of(population);

    const rootColumns = tree.layers.length > 0 ? tree.layers[0].taller.length : 1;
    const layers: DenormalizedLayer[] = [];
    const precisionIssues: PrecisionIssue[] = [];

    tree.layers.forEach((rationalLayer, index) => {
        const layerNumber = index + 1;
        const labels = subpopulationLabels(layerNumber, rootColumns);
        const { treatment, control } = orientGroups(rationalLayer, layerNumber);

        const countGroup = (columns: RationalColumn[], role: GroupRole): SubpopulationCount[] =>
            columns.map((col, i) => {
                const counts = columnCounts(col, labels[i], population);
                checkWhole(counts, layerNumber, role, precisionIssues);
                return counts;
            });

        const treatmentCounts = countGroup(treatment, 'treatment');
        const controlCounts = countGroup(control, 'control');

        const total = [...treatmentCounts, ...controlCounts]
            .reduce((sum, row) => sum.add(row.groupSize), Fraction.of(0));

        if (!total.equals(populationFraction)) {
            precisionIssues.push({
                layer: layerNumber,
                label: null,
                role: null,
                message: `Layer ${layerNumber} group sizes add up to ${total}, not ${population}`
            });
        }

        layers.push({
            layer: layerNumber,
            labels,
            treatment: treatmentCounts,
            control: controlCounts,
            total
        });
    });

    if (precisionIssues.length > 0) {
        if (precision === 'error') {
            throw new PrecisionLossError(precisionIssues);
        }
        for (const issue of precisionIssues) {
            console.warn(`Precision loss: ${issue.message}`);
        }
    }

    return {
        population,
        heightMultiplier,
        widthMultiplier,
        layers,
        precisionIssues
    };
}

function checkWhole(
    counts: SubpopulationCount,
    layerNumber: number,
    role: GroupRole,
    issues: PrecisionIssue[]
): void {
    const where = counts.label.length === 0
        ? `layer ${layerNumber} ${role}`
        : `layer ${layerNumber} ${role} sub-population ${counts.label}`;

    if (!counts.groupSize.isInteger()) {
        issues.push({
            layer: layerNumber,
            label: counts.label,
            role,
            message: `Group size ${counts.groupSize} in ${where} is not a whole number`
        });
    }
    if (!counts.recovered.isInteger()) {
        issues.push({
            layer: layerNumber,
            label: counts.label,
            role,
            message: `Recovered count ${counts.recovered} in ${where} is not a whole number`
        });
    }
}
