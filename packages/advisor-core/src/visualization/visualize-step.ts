/**
 * Visualization Step
 *
 * Derives chart payloads from the first ledger entry of each chartable tool.
 * Each chart kind is independent: missing or bad data skips that chart only.
 */

import { isAbortError, withRetry } from '../collaborators/retry';
import type { Rasterizer } from '../collaborators/types';
import { firstEntryForTool, parseObservation, type LedgerEntry } from '../ledger';
import { systemNote, type ConversationMessage } from '../messages';
import { errorMessage } from '../shared/guards';
import { createAgentLogger, type TraceContext } from '../tracing';
import { FINANCIAL_TOOL_NAMES } from '../workers/financial-tools';
import {
    buildFraudChart,
    buildProjectionChart,
    buildRiskChart,
    fraudFlagOf,
    toPlotlyFigure,
} from './charts';
import type { ChartId, VegaLiteSpec, VisualizationOutput } from './types';

const log = createAgentLogger('Visualize');

export interface VisualizeOptions {
    rasterizer?: Rasterizer;
    retries?: number;
    retryDelayMs?: number;
    signal?: AbortSignal;
    traceContext?: TraceContext;
}

const CHART_SOURCES: ReadonlyArray<{
    id: ChartId;
    toolName: string;
    build: (data: Record<string, unknown>) => VegaLiteSpec | null;
}> = [
    { id: 'projection', toolName: FINANCIAL_TOOL_NAMES.projection, build: buildProjectionChart },
    { id: 'risk', toolName: FINANCIAL_TOOL_NAMES.risk, build: buildRiskChart },
    { id: 'fraud', toolName: FINANCIAL_TOOL_NAMES.fraud, build: buildFraudChart },
];

function observationFor(ledger: readonly LedgerEntry[], toolName: string): Record<string, unknown> | null {
    const entry = firstEntryForTool(ledger, toolName);
    return entry ? parseObservation(entry.output) : null;
}

/**
 * PNG bytes as an embeddable data URI
 */
export function toPngDataUri(bytes: Uint8Array): string {
    return `data:image/png;base64,${Buffer.from(bytes).toString('base64')}`;
}

async function renderImages(
    charts: Record<string, VegaLiteSpec>,
    options: VisualizeOptions
): Promise<Record<string, string>> {
    const { rasterizer, retries = 1, retryDelayMs = 0, signal, traceContext } = options;
    const images: Record<string, string> = {};
    if (!rasterizer) return images;

    for (const [id, spec] of Object.entries(charts)) {
        try {
            const bytes = await withRetry(() => rasterizer.rasterize(spec, id), {
                retries,
                delayMs: retryDelayMs,
                signal,
                operation: `rasterize ${id}`,
                traceContext,
            });
            if (bytes && bytes.length > 0) {
                images[id] = toPngDataUri(bytes);
            }
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) throw error;
            log.warnWithTrace(traceContext, 'Chart rendering failed, keeping descriptor only', {
                chart: id,
                error: errorMessage(error),
            });
        }
    }

    return images;
}

export async function visualize(
    ledger: readonly LedgerEntry[],
    options: VisualizeOptions = {}
): Promise<VisualizationOutput> {
    const output: VisualizationOutput = { charts: {}, images: {}, figures: {}, indicators: {} };

    for (const source of CHART_SOURCES) {
        try {
            const data = observationFor(ledger, source.toolName);
            if (!data) continue;

            const chart = source.build(data);
            if (chart) {
                output.charts[source.id] = chart;
                output.figures[source.id] = toPlotlyFigure(chart);
            }

            if (source.id === 'fraud') {
                const flag = fraudFlagOf(data);
                if (flag !== null) output.indicators.fraudFlag = flag;
            }
        } catch (error) {
            log.warnWithTrace(options.traceContext, 'Skipping chart', {
                chart: source.id,
                error: errorMessage(error),
            });
        }
    }

    output.images = await renderImages(output.charts, options);

    log.infoWithTrace(options.traceContext, 'Visualization complete', {
        charts: Object.keys(output.charts),
        images: Object.keys(output.images).length,
    });

    return output;
}

/**
 * Notes listing what the step produced
 */
export function describeVisualization(output: VisualizationOutput): ConversationMessage[] {
    const chartIds = Object.keys(output.charts);
    const notes = [
        systemNote(
            chartIds.length > 0
                ? `Charts prepared: ${chartIds.join(', ')}.`
                : 'No chart could be built from the gathered data.',
            { source: 'visualize' }
        ),
    ];

    const imageIds = Object.keys(output.images);
    if (imageIds.length > 0) {
        notes.push(systemNote(`Chart images rendered: ${imageIds.join(', ')}.`, { source: 'visualize' }));
    }
    if (typeof output.indicators.fraudFlag === 'boolean') {
        notes.push(
            systemNote(`Fraud flag: ${output.indicators.fraudFlag ? 'raised' : 'not raised'}.`, { source: 'visualize' })
        );
    }

    return notes;
}
