/**
 * Render a LayerChart as a standalone SVG string.
 * Deterministic output: coordinates rounded to 2 decimals.
 */

import { strings } from '../../strings.js';
import { LayerChart } from './bars.js';

export interface SvgOptions {
    width?: number;
    height?: number;
    padding?: number;
    showTitle?: boolean;
}

export function renderLayerSvg(chart: LayerChart, options: SvgOptions = {}): string {
    const width = options.width ?? 480;
    const height = options.height ?? 360;
    const padding = options.padding ?? 40;
    const showTitle = options.showTitle ?? true;

    const plotWidth = width - padding * 2;
    const plotHeight = height - padding * 2;
    const xMax = chart.bars.reduce((max, bar) => Math.max(max, bar.x1), 0) || 1;

    const sx = (x: number) => round(padding + (x / xMax) * plotWidth);
    const sy = (y: number) => round(padding + (1 - y / chart.yMax) * plotHeight);

    const lines: string[] = [];
    lines.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`);
    lines.push('  <defs>');
    lines.push('    <pattern id="hatch-x" width="8" height="8" patternUnits="userSpaceOnUse">');
    lines.push('      <path d="M0,0 L8,8 M8,0 L0,8" stroke="#333" stroke-width="1"/>');
    lines.push('    </pattern>');
    lines.push('  </defs>');

    if (showTitle) {
        lines.push(`  <text x="${round(width / 2)}" y="${round(padding / 2)}" text-anchor="middle" font-size="14">${escapeXml(strings.chart.title(chart.layer))}</text>`);
    }

    // Bars
    for (const bar of chart.bars) {
        const x = sx(bar.x0);
        const y = sy(bar.height);
        const w = round(sx(bar.x1) - x);
        const h = round(sy(0) - y);
        lines.push(`  <rect x="${x}" y="${y}" width="${w}" height="${h}" fill="${bar.color}" stroke="#333"/>`);
        if (bar.hatched) {
            lines.push(`  <rect x="${x}" y="${y}" width="${w}" height="${h}" fill="url(#hatch-x)" stroke="none"/>`);
        }
    }

    // Axes
    const x0 = round(padding);
    const xEnd = round(padding + plotWidth);
    const yBottom = round(padding + plotHeight);
    lines.push(`  <line x1="${x0}" y1="${yBottom}" x2="${xEnd}" y2="${yBottom}" stroke="#000"/>`);
    lines.push(`  <line x1="${x0}" y1="${round(padding)}" x2="${x0}" y2="${yBottom}" stroke="#000"/>`);
    lines.push(`  <text x="${round(width / 2)}" y="${round(height - padding / 4)}" text-anchor="middle" font-size="12">${escapeXml(chart.xLabel)}</text>`);
    lines.push(`  <text x="${round(padding / 3)}" y="${round(height / 2)}" text-anchor="middle" font-size="12" transform="rotate(-90 ${round(padding / 3)} ${round(height / 2)})">${escapeXml(chart.yLabel)}</text>`);

    lines.push('</svg>');
    return lines.join('\n');
}

function round(value: number): number {
    return Number(value.toFixed(2));
}

function escapeXml(str: string): string {
    return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
