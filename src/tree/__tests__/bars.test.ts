/**
 * Layer Bars and SVG Tests
 *
 * - Treatment bars first, control bars hatched
 * - Even layers swapped so treatment keeps its side
 * - Cumulative x positions, shared colors for sibling sub-populations
 * - Deterministic SVG output
 */

import { describe, it, expect } from 'vitest';
import { buildSimpsonTree } from '../pipeline/3-build-tree.js';
import { layoutLayerBars, layoutTreeBars, PALETTE } from '../render/bars.js';
import { renderLayerSvg } from '../render/svg.js';
import { loadFixture } from './helpers/loadFixture.js';

describe('layoutLayerBars', () => {
    it('draws layer 1 treatment then hatched control', () => {
        const chart = layoutLayerBars(loadFixture('classic-root'), 1);

        expect(chart.bars).toEqual([
            { label: '', role: 'treatment', x0: 0, x1: 0.5, height: 0.6, hatched: false, color: 'orange' },
            { label: '', role: 'control', x0: 0.5, x1: 1, height: 0.4, hatched: true, color: 'orange' }
        ]);
        expect(chart.xLabel).toBe('proportion in sub-population');
        expect(chart.yLabel).toBe('recovery rate');
        expect(chart.yMax).toBe(1);
    });

    it('swaps groups on even layers', () => {
        const tree = buildSimpsonTree({ firstLayer: loadFixture('classic-root'), depth: 2 });
        const chart = layoutLayerBars(tree.layers[1], 2);
        const [t0, t1, c0, c1] = chart.bars;

        // Treatment on layer 2 is the group cut from the layer 1 treatment column
        expect(t0.role).toBe('treatment');
        expect(t0.height).toBeCloseTo(0.78, 12);
        expect(t1.height).toBeCloseTo(0.18, 12);
        expect(c0.role).toBe('control');
        expect(c0.height).toBeCloseTo(0.82, 12);
        expect(c1.height).toBeCloseTo(0.22, 12);
    });

    it('lays bars end to end across the whole population', () => {
        const tree = buildSimpsonTree({ firstLayer: loadFixture('classic-root'), depth: 2 });
        const { bars } = layoutLayerBars(tree.layers[1], 2);

        expect(bars[0].x0).toBe(0);
        for (let i = 1; i < bars.length; i++) {
            expect(bars[i].x0).toBe(bars[i - 1].x1);
        }
        expect(bars[1].x1).toBeCloseTo(0.5, 12);
        expect(bars[3].x1).toBeCloseTo(1, 12);
    });

    it('gives sibling sub-populations the same color', () => {
        const tree = buildSimpsonTree({ firstLayer: loadFixture('classic-root'), depth: 3 });
        const { bars } = layoutLayerBars(tree.layers[2], 3);

        expect(bars.map(b => b.color)).toEqual([
            'orange', 'lightgreen', 'yellow', 'hotpink',
            'orange', 'lightgreen', 'yellow', 'hotpink'
        ]);
        expect(bars.map(b => b.label)).toEqual(['00', '01', '10', '11', '00', '01', '10', '11']);
    });

    it('wraps the palette on deep layers', () => {
        const tree = buildSimpsonTree({ firstLayer: loadFixture('classic-root'), depth: 6 });
        const { bars } = layoutLayerBars(tree.layers[5], 6);

        expect(bars).toHaveLength(64);
        expect(bars[16].color).toBe(PALETTE[0]);
        expect(bars[31].color).toBe(PALETTE[15]);
    });
});

describe('layoutTreeBars', () => {
    it('makes one chart per layer', () => {
        const tree = buildSimpsonTree({ firstLayer: loadFixture('multi-column-root'), depth: 3 });
        const charts = layoutTreeBars(tree);

        expect(charts.map(c => c.layer)).toEqual([1, 2, 3]);
        expect(charts[0].bars.map(b => b.label)).toEqual(['0', '1', '0', '1']);
        expect(charts[1].bars).toHaveLength(8);
    });
});

describe('renderLayerSvg', () => {
    const svg = renderLayerSvg(layoutLayerBars(loadFixture('classic-root'), 1));
    const lines = svg.split('\n');

    it('wraps the chart in an svg element', () => {
        expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="480" height="360">');
        expect(lines[lines.length - 1]).toBe('</svg>');
    });

    it('draws one rect per bar plus a hatch overlay for controls', () => {
        expect(lines.filter(l => l.trimStart().startsWith('<rect'))).toEqual([
            '  <rect x="40" y="152" width="200" height="168" fill="orange" stroke="#333"/>',
            '  <rect x="240" y="208" width="200" height="112" fill="orange" stroke="#333"/>',
            '  <rect x="240" y="208" width="200" height="112" fill="url(#hatch-x)" stroke="none"/>'
        ]);
    });

    it('labels the chart and the x axis', () => {
        expect(lines).toContain('  <text x="240" y="20" text-anchor="middle" font-size="14">Layer 1</text>');
        expect(lines).toContain('  <text x="240" y="350" text-anchor="middle" font-size="12">proportion in sub-population</text>');
        expect(lines).toContain('  <line x1="40" y1="320" x2="440" y2="320" stroke="#000"/>');
    });

    it('can leave out the title', () => {
        const untitled = renderLayerSvg(layoutLayerBars(loadFixture('classic-root'), 1), { showTitle: false });
        expect(untitled).not.toContain('Layer 1');
    });

    it('is deterministic', () => {
        expect(renderLayerSvg(layoutLayerBars(loadFixture('classic-root'), 1))).toBe(svg);
    });
});
