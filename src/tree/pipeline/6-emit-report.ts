/**
 * Step 6: Emit Report
 *
 * Renders denormalized counts as text, one section per layer:
 *
 *   ***LAYER 2***
 *
 *   TREATMENT GROUP
 *   In sub-population 0, 273 out of 350 people recovered.
 *   ...
 *
 * Rows with an empty label (layer 1 of a single-pair root) carry no
 * sub-population prefix. Counts that lost
 * precision print as exact fractions ("n/d").
 */

import { strings } from '../../strings.js';
import { DenormalizedTree, DenormalizedLayer, SubpopulationCount } from './types.js';

export function emitReport(data: DenormalizedTree): string {
    return data.layers.map(emitLayerSection).join('\n\n');
}

export function emitLayerSection(layer: DenormalizedLayer): string {
    const s = strings.report;
    const lines: string[] = [s.layerHeading(layer.layer)];

    lines.push('', s.treatmentGroup);
    for (const row of layer.treatment) {
        lines.push(formatRow(row));
    }

    lines.push('', s.controlGroup);
    for (const row of layer.control) {
        lines.push(formatRow(row));
    }

    return lines.join('\n');
}

function formatRow(row: SubpopulationCount): string {
    const counts = strings.report.recovered(row.recovered.toString(), row.groupSize.toString());
    return row.label.length === 0 ? counts : strings.report.inSubpopulation(row.label) + counts;
}
