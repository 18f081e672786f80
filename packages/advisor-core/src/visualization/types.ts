/**
 * Chart payload types produced by the visualization step
 */

export type ChartId = 'projection' | 'risk' | 'fraud';

export type VegaFieldType = 'quantitative' | 'nominal' | 'ordinal' | 'temporal';

export interface VegaEncodingChannel {
    field: string;
    type: VegaFieldType;
    title?: string;
    scale?: { domain: [number, number] };
}

/**
 * Minimal Vega-Lite v5 chart descriptor
 */
export interface VegaLiteSpec {
    $schema: string;
    title: string;
    description?: string;
    width?: number;
    height?: number;
    data: { values: Array<Record<string, string | number>> };
    mark: { type: 'line' | 'bar'; point?: boolean; tooltip?: boolean };
    encoding: {
        x: VegaEncodingChannel;
        y: VegaEncodingChannel;
        color?: VegaEncodingChannel;
    };
}

export interface PlotlyTrace {
    type: 'scatter' | 'bar';
    x: Array<string | number>;
    y: number[];
    mode?: 'lines' | 'lines+markers';
    name?: string;
}

interface PlotlyAxis {
    title: { text: string };
    range?: [number, number];
}

/**
 * Plotly figure JSON (data + layout), renderable by any Plotly client
 */
export interface PlotlyFigure {
    data: PlotlyTrace[];
    layout: {
        title: { text: string };
        xaxis: PlotlyAxis;
        yaxis: PlotlyAxis;
    };
}

export type IndicatorValue = boolean | number | string;

export interface VisualizationOutput {
    charts: Record<string, VegaLiteSpec>;
    images: Record<string, string>;
    figures: Record<string, PlotlyFigure>;
    indicators: Record<string, IndicatorValue>;
}
