/**
 * Visualization Module
 */

export type {
    ChartId,
    VegaFieldType,
    VegaEncodingChannel,
    VegaLiteSpec,
    PlotlyTrace,
    PlotlyFigure,
    IndicatorValue,
    VisualizationOutput,
} from './types';

export {
    VEGA_LITE_SCHEMA,
    DEFAULT_PROJECTION_YEARS,
    toNumber,
    buildProjectionChart,
    buildRiskChart,
    buildFraudChart,
    fraudFlagOf,
    toPlotlyFigure,
} from './charts';

export {
    type VisualizeOptions,
    visualize,
    describeVisualization,
    toPngDataUri,
} from './visualize-step';
