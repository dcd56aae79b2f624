#!/usr/bin/env -S npx tsx
/**
 * Print count data for a Simpson tree, and optionally write one SVG
 * chart per layer.
 *
 * Usage:
 *   npm run report -- 3
 *   npm run report -- 4 --treatment 0.6,0.5 --control 0.4,0.5 --svg ./out
 *   npm run report -- 5 --strict
 *
 * --strict turns precision losses into a failure instead of a warning.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Column, generateSimpsonData, layoutTreeBars, renderLayerSvg } from '../src/tree/index.js';
import { strings } from '../src/strings.js';

interface ScriptOptions {
    depth: number;
    treatment: Column;
    control: Column;
    svgDir: string | null;
    strict: boolean;
}

function parseColumn(value: string | undefined, flag: string): Column {
    const parts = (value ?? '').split(',').map(Number);
    if (parts.length !== 2 || parts.some(n => Number.isNaN(n))) {
        throw new Error(`${flag} expects "height,width", got "${value ?? ''}"`);
    }
    return { height: parts[0], width: parts[1] };
}

function parseArgs(args: string[]): ScriptOptions {
    const options: ScriptOptions = {
        depth: Number.NaN,
        treatment: { height: 0.6, width: 0.5 },
        control: { height: 0.4, width: 0.5 },
        svgDir: null,
        strict: false
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '--treatment':
                options.treatment = parseColumn(args[++i], arg);
                break;
            case '--control':
                options.control = parseColumn(args[++i], arg);
                break;
            case '--svg':
                options.svgDir = args[++i] ?? null;
                break;
            case '--strict':
                options.strict = true;
                break;
            default:
                options.depth = Number(arg);
        }
    }

    return options;
}

function main() {
    const args = process.argv.slice(2);
    if (args.length === 0) {
        console.error(strings.script.usage);
        process.exit(1);
    }

    try {
        const options = parseArgs(args);

        // Treatment is the taller group of the first layer
        const { tree, data, report } = generateSimpsonData({
            firstLayer: { taller: [options.treatment], shorter: [options.control] },
            depth: options.depth,
            denormalize: { precision: options.strict ? 'error' : 'warn' }
        });

        console.log(`Population size: ${data.population}\n`);
        console.log(report);

        if (options.svgDir) {
            const dir = path.resolve(options.svgDir);
            fs.mkdirSync(dir, { recursive: true });
            for (const chart of layoutTreeBars(tree)) {
                const file = path.join(dir, `layer-${chart.layer}.svg`);
                fs.writeFileSync(file, renderLayerSvg(chart));
                console.log(strings.script.wroteSvg(file));
            }
        }
    } catch (e) {
        console.error(strings.script.failed(e instanceof Error ? e.message : String(e)));
        process.exit(1);
    }
}

main();
