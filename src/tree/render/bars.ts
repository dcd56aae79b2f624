/**
 * Layer Bars
 *
 * Geometry for drawing one layer as side-by-side bars: treatment columns
 * first, then control columns, each bar as wide as its share of the
 * population and as tall as its recovery rate. Control bars are hatched.
 * Sibling sub-populations share a color across the two groups.
 */

import { strings } from '../../strings.js';
import { SimpsonTree, Layer, GroupRole, SubpopulationLabel } from '../pipeline/types.js';
import { orientGroups, subpopulationLabels } from '../pipeline/5-denormalize.js';
import { getLayer } from '../pipeline/3-build-tree.js';

export const PALETTE: readonly string[] = [
    'orange', 'lightgreen', 'yellow', 'hotpink',
    'lightseagreen', 'tomato', 'beige', 'khaki',
    'cyan', 'lightsalmon', 'thistle', 'gainsboro',
    'lavenderblush', 'goldenrod', 'lightskyblue', 'greenyellow'
];

export interface LayerBar {
    label: SubpopulationLabel;
    role: GroupRole;
    x0: number;
    x1: number;
    height: number;
    hatched: boolean;
    color: string;
}

export interface LayerChart {
    layer: number;
    bars: LayerBar[];
    xLabel: string;
    yLabel: string;
    yMax: number;
}

/**
 * Bars for a single layer. `rootColumns` is the number of column pairs
 * in the tree's first layer (used for labels only).
 */
export function layoutLayerBars(
    layer: Layer,
    layerNumber: number,
    rootColumns: number = 1
): LayerChart {
    const { treatment, control } = orientGroups(layer, layerNumber);
    const labels = subpopulationLabels(layerNumber, rootColumns);

    const bars: LayerBar[] = [];
    let x = 0;

    const place = (role: GroupRole) => (col: { height: number; width: number }, i: number) => {
        bars.push({
            label: labels[i],
            role,
            x0: x,
            x1: x + col.width,
            height: col.height,
            hatched: role === 'control',
            color: PALETTE[i % PALETTE.length]
        });
        x += col.width;
    };

    treatment.forEach(place('treatment'));
    control.forEach(place('control'));

    return {
        layer: layerNumber,
        bars,
        xLabel: strings.chart.xAxis,
        yLabel: strings.chart.yAxis,
        yMax: 1
    };
}

/**
 * One chart per layer of the tree.
 */
export function layoutTreeBars(tree: SimpsonTree): LayerChart[] {
    const rootColumns = getLayer(tree, 1).taller.length;
    return tree.layers.map((layer, index) => layoutLayerBars(layer, index + 1, rootColumns));
}
