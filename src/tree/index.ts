/**
 * Simpson Tree Module Entry Point
 *
 * Usage:
 *   import { generateSimpsonData } from './tree/index.js';
 *
 *   const { report } = generateSimpsonData({
 *       firstLayer: { taller: [{ height: 0.6, width: 0.5 }], shorter: [{ height: 0.4, width: 0.5 }] },
 *       depth: 3
 *   });
 */

export * from './pipeline/index.js';

export {
    layoutLayerBars,
    layoutTreeBars,
    PALETTE,
    type LayerBar,
    type LayerChart
} from './render/bars.js';
export { renderLayerSvg, type SvgOptions } from './render/svg.js';
