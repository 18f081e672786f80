/**
 * Visualization Tests
 *
 * Chart builders, Plotly conversion and the visualization step.
 */

import { describe, it, expect, vi } from 'vitest';
import { createLedgerEntry } from '../src/ledger';
import {
  buildFraudChart,
  buildProjectionChart,
  buildRiskChart,
  describeVisualization,
  toNumber,
  toPlotlyFigure,
  visualize,
  VEGA_LITE_SCHEMA,
} from '../src/visualization';
import type { Rasterizer } from '../src/collaborators/types';
import {
  FRAUD_OBSERVATION,
  PENSION_OBSERVATION,
  RISK_OBSERVATION,
  fixedRasterizer,
} from './mocks/fake-collaborators';

const entry = (workerName: string, toolName: string, observation: unknown) =>
  createLedgerEntry(workerName, { toolName, input: {}, observation });

const riskEntry = entry('risk', 'analyze_risk_profile', JSON.stringify(RISK_OBSERVATION));
const fraudEntry = entry('fraud', 'detect_fraud', JSON.stringify(FRAUD_OBSERVATION));
const pensionEntry = entry('projection', 'project_pension', PENSION_OBSERVATION);

describe('chart builders', () => {
  it('should parse currency strings', () => {
    expect(toNumber('$1,250,000')).toBe(1250000);
    expect(toNumber(' 42 ')).toBe(42);
    expect(toNumber('abc')).toBeNull();
    expect(toNumber('')).toBeNull();
    expect(toNumber(Number.NaN)).toBeNull();
  });

  describe('buildProjectionChart', () => {
    it('should draw a two-point balance line', () => {
      expect(buildProjectionChart(PENSION_OBSERVATION)).toEqual({
        $schema: VEGA_LITE_SCHEMA,
        title: 'Projected balance over time',
        description: 'Projected balance over time',
        data: {
          values: [
            { year: 0, balance: 45000 },
            { year: 25, balance: 310000 },
          ],
        },
        mark: { type: 'line', point: true, tooltip: true },
        encoding: {
          x: { field: 'year', type: 'quantitative', title: 'Year' },
          y: { field: 'balance', type: 'quantitative', title: 'Balance ($)' },
        },
      });
    });

    it('should accept the alternative field names', () => {
      const chart = buildProjectionChart({
        starting_balance: 1000,
        projected_balance: 2500,
        projection_period_years: 7.9,
      });
      expect(chart?.data.values).toEqual([
        { year: 0, balance: 1000 },
        { year: 7, balance: 2500 },
      ]);
    });

    it('should use ten years when the duration is missing or not positive', () => {
      expect(buildProjectionChart({ current_savings: '$100', projected_balance: 200 })?.data.values[1]).toEqual({
        year: 10,
        balance: 200,
      });
      expect(
        buildProjectionChart({ current_savings: 100, projected_balance: 200, years_remaining: 0 })?.data.values[1]
      ).toEqual({ year: 10, balance: 200 });
    });

    it('should skip the chart without both balances', () => {
      expect(buildProjectionChart({ current_savings: '$100' })).toBeNull();
      expect(buildProjectionChart({ current_savings: 'unknown', projected_balance: 5 })).toBeNull();
    });
  });

  it('should draw single-bar risk and fraud charts from numeric scores', () => {
    expect(buildRiskChart(RISK_OBSERVATION)?.data.values).toEqual([{ metric: 'Risk Score', value: 62 }]);
    expect(buildFraudChart(FRAUD_OBSERVATION)?.data.values).toEqual([{ metric: 'Fraud Confidence', value: 0.87 }]);
    expect(buildRiskChart({ risk_score: '62' })).toBeNull();
    expect(buildFraudChart({})).toBeNull();
  });

  describe('toPlotlyFigure', () => {
    it('should render bar charts as bar traces', () => {
      const chart = buildRiskChart(RISK_OBSERVATION);
      expect(chart).not.toBeNull();
      if (!chart) return;

      expect(toPlotlyFigure(chart)).toEqual({
        data: [{ type: 'bar', x: ['Risk Score'], y: [62], name: 'Score' }],
        layout: {
          title: { text: 'Risk score' },
          xaxis: { title: { text: '' } },
          yaxis: { title: { text: 'Score' } },
        },
      });
    });

    it('should render line charts as line-and-marker traces', () => {
      const chart = buildProjectionChart(PENSION_OBSERVATION);
      if (!chart) throw new Error('expected a projection chart');

      expect(toPlotlyFigure(chart).data).toEqual([
        { type: 'scatter', mode: 'lines+markers', x: [0, 25], y: [45000, 310000], name: 'Balance ($)' },
      ]);
    });
  });
});

describe('visualize', () => {
  it('should build one chart per data kind and the fraud flag', async () => {
    const output = await visualize([riskEntry, fraudEntry, pensionEntry]);

    expect(Object.keys(output.charts)).toEqual(['projection', 'risk', 'fraud']);
    expect(Object.keys(output.figures)).toEqual(['projection', 'risk', 'fraud']);
    expect(output.indicators).toEqual({ fraudFlag: true });
    expect(output.images).toEqual({});
  });

  it('should use the first result recorded for a tool', async () => {
    const later = entry('risk', 'analyze_risk_profile', '{"risk_score":90}');
    const output = await visualize([riskEntry, later]);
    expect(output.charts.risk.data.values).toEqual([{ metric: 'Risk Score', value: 62 }]);
  });

  it('should skip unreadable data without losing other charts', async () => {
    const broken = entry('risk', 'analyze_risk_profile', 'The risk service timed out');
    const output = await visualize([broken, fraudEntry]);

    expect(Object.keys(output.charts)).toEqual(['fraud']);
  });

  it('should return nothing for an empty ledger', async () => {
    await expect(visualize([])).resolves.toEqual({ charts: {}, images: {}, figures: {}, indicators: {} });
  });

  it('should embed rasterized charts as PNG data URIs', async () => {
    const rasterizer = fixedRasterizer(new Uint8Array([1, 2, 3]));
    const output = await visualize([riskEntry], { rasterizer });

    expect(output.images).toEqual({ risk: 'data:image/png;base64,AQID' });
    expect(rasterizer.rasterize).toHaveBeenCalledWith(output.charts.risk, 'risk');
  });

  it('should keep descriptors when rendering fails', async () => {
    const rasterize = vi.fn<Rasterizer['rasterize']>(async () => {
      throw new Error('renderer crashed');
    });

    const output = await visualize([riskEntry], { rasterizer: { rasterize }, retries: 1, retryDelayMs: 0 });

    expect(rasterize).toHaveBeenCalledTimes(2);
    expect(Object.keys(output.charts)).toEqual(['risk']);
    expect(output.images).toEqual({});
  });

  it('should skip images the renderer declines', async () => {
    const output = await visualize([riskEntry], { rasterizer: fixedRasterizer(null) });
    expect(output.images).toEqual({});
  });
});

describe('describeVisualization', () => {
  it('should list charts, images and the fraud flag', async () => {
    const output = await visualize([riskEntry, fraudEntry], { rasterizer: fixedRasterizer(new Uint8Array([1])) });

    expect(describeVisualization(output).map((m) => m.content)).toEqual([
      'Charts prepared: risk, fraud.',
      'Chart images rendered: risk, fraud.',
      'Fraud flag: raised.',
    ]);
  });

  it('should say when nothing could be drawn', () => {
    const notes = describeVisualization({ charts: {}, images: {}, figures: {}, indicators: {} });
    expect(notes.map((m) => m.content)).toEqual(['No chart could be built from the gathered data.']);
    expect(notes[0].source).toBe('visualize');
  });
});
