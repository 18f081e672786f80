/**
 * Chart builders
 *
 * Vega-Lite descriptors from tool observations, and Plotly figure JSON
 * derived from those descriptors.
 */

import type { PlotlyFigure, VegaLiteSpec } from './types';

export const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

/** Duration used when a projection carries no usable year count */
export const DEFAULT_PROJECTION_YEARS = 10;

const PROJECTION_FIELDS = {
    start: ['starting_balance', 'current_savings'],
    end: ['projected_balance', 'projected_balance_at_retirement'],
    years: ['projection_period_years', 'years_remaining'],
} as const;

// ============================================================
// Field helpers
// ============================================================

/**
 * Parse a number, accepting currency strings like "$1,250,000"
 */
export function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value !== 'string') {
        return null;
    }
    const cleaned = value.replace(/[$,\s]/g, '');
    if (cleaned === '') return null;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : null;
}

function firstField(data: Record<string, unknown>, keys: readonly string[]): unknown {
    for (const key of keys) {
        if (data[key] !== undefined && data[key] !== null) {
            return data[key];
        }
    }
    return undefined;
}

function finiteNumber(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function singleBar(title: string, metric: string, value: number, axisTitle: string): VegaLiteSpec {
    return {
        $schema: VEGA_LITE_SCHEMA,
        title,
        description: title,
        data: { values: [{ metric, value }] },
        mark: { type: 'bar', tooltip: true },
        encoding: {
            x: { field: 'metric', type: 'nominal', title: '' },
            y: { field: 'value', type: 'quantitative', title: axisTitle },
        },
    };
}

// ============================================================
// Builders
// ============================================================

/**
 * Two-point balance line from start to projected end; null without both balances
 */
export function buildProjectionChart(data: Record<string, unknown>): VegaLiteSpec | null {
    const start = toNumber(firstField(data, PROJECTION_FIELDS.start));
    const end = toNumber(firstField(data, PROJECTION_FIELDS.end));
    if (start === null || end === null) {
        return null;
    }

    const rawYears = toNumber(firstField(data, PROJECTION_FIELDS.years));
    const years = rawYears !== null && rawYears > 0 ? Math.trunc(rawYears) : DEFAULT_PROJECTION_YEARS;

    return {
        $schema: VEGA_LITE_SCHEMA,
        title: 'Projected balance over time',
        description: 'Projected balance over time',
        data: {
            values: [
                { year: 0, balance: start },
                { year: years, balance: end },
            ],
        },
        mark: { type: 'line', point: true, tooltip: true },
        encoding: {
            x: { field: 'year', type: 'quantitative', title: 'Year' },
            y: { field: 'balance', type: 'quantitative', title: 'Balance ($)' },
        },
    };
}

export function buildRiskChart(data: Record<string, unknown>): VegaLiteSpec | null {
    const score = finiteNumber(data.risk_score);
    return score === null ? null : singleBar('Risk score', 'Risk Score', score, 'Score');
}

export function buildFraudChart(data: Record<string, unknown>): VegaLiteSpec | null {
    const confidence = finiteNumber(data.confidence_score);
    return confidence === null ? null : singleBar('Fraud confidence', 'Fraud Confidence', confidence, 'Confidence');
}

export function fraudFlagOf(data: Record<string, unknown>): boolean | null {
    return typeof data.is_fraudulent === 'boolean' ? data.is_fraudulent : null;
}

/**
 * Plotly rendering of a descriptor: lines for line marks, bars otherwise
 */
export function toPlotlyFigure(spec: VegaLiteSpec): PlotlyFigure {
    const { x, y } = spec.encoding;
    const xs: Array<string | number> = [];
    const ys: number[] = [];

    for (const row of spec.data.values) {
        const yValue = toNumber(row[y.field]);
        const xValue = row[x.field];
        if (yValue === null || xValue === undefined) continue;
        xs.push(xValue);
        ys.push(yValue);
    }

    const name = y.title ?? y.field;
    const trace =
        spec.mark.type === 'line'
            ? { type: 'scatter' as const, mode: 'lines+markers' as const, x: xs, y: ys, name }
            : { type: 'bar' as const, x: xs, y: ys, name };

    return {
        data: [trace],
        layout: {
            title: { text: spec.title },
            xaxis: { title: { text: x.title ?? x.field } },
            yaxis: { title: { text: y.title ?? y.field } },
        },
    };
}
