/**
 * Output Strings - text used by the count report and the bar charts
 */

export const strings = {
    report: {
        layerHeading: (layer: number) => `***LAYER ${layer}***`,
        treatmentGroup: 'TREATMENT GROUP',
        controlGroup: 'CONTROL GROUP',
        recovered: (recovered: string, total: string) =>
            `${recovered} out of ${total} people recovered.`,
        inSubpopulation: (label: string) => `In sub-population ${label}, `
    },

    chart: {
        xAxis: 'proportion in sub-population',
        yAxis: 'recovery rate',
        title: (layer: number) => `Layer ${layer}`
    },

    script: {
        usage: 'Usage: npm run report -- <depth> [--treatment h,w] [--control h,w] [--svg <dir>] [--strict]',
        wroteSvg: (path: string) => `Wrote ${path}`,
        failed: (message: string) => `Failed: ${message}`
    }
};
