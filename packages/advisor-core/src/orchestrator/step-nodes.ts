/**
 * Step Nodes
 *
 * Worker, visualization, consolidation and finish nodes. Workers and the
 * visualization step always hand control back to the supervisor.
 */

import type { LangGraphRunnableConfig } from '@langchain/langgraph';
import type { Rasterizer, Synthesizer } from '../collaborators/types';
import { consolidate, finishWithoutConsolidation } from '../consolidation';
import type { ConversationState, ConversationStateUpdate, WorkerId } from '../state';
import { createAgentLogger, createChildSpan } from '../tracing';
import { describeVisualization, visualize } from '../visualization';
import { invokeWorker, type WorkerRegistry } from '../workers';

const log = createAgentLogger('StepNodes');

/**
 * Retry and preview settings shared by the step nodes
 */
export interface StepNodeSettings {
    retries: number;
    retryDelayMs: number;
    previewLength: number;
}

// ============================================================
// Worker Nodes
// ============================================================

export function createWorkerNode(workerId: WorkerId, registry: WorkerRegistry, settings: StepNodeSettings) {
    return async (
        state: ConversationState,
        runConfig?: LangGraphRunnableConfig
    ): Promise<ConversationStateUpdate> => {
        const delta = await invokeWorker(workerId, registry.get(workerId), state, {
            previewLength: settings.previewLength,
            retries: settings.retries,
            retryDelayMs: settings.retryDelayMs,
            signal: runConfig?.signal,
        });

        return {
            messages: delta.appendedMessages,
            ledger: delta.appendedLedgerEntries,
            lastStep: workerId,
            stepsVisited: [workerId],
        };
    };
}

// ============================================================
// Visualization Node
// ============================================================

export function createVisualizeNode(settings: StepNodeSettings & { rasterizer?: Rasterizer }) {
    return async (
        state: ConversationState,
        runConfig?: LangGraphRunnableConfig
    ): Promise<ConversationStateUpdate> => {
        const output = await visualize(state.ledger, {
            rasterizer: settings.rasterizer,
            retries: settings.retries,
            retryDelayMs: settings.retryDelayMs,
            signal: runConfig?.signal,
            traceContext: state.traceContext ? createChildSpan(state.traceContext, 'visualize') : undefined,
        });

        return {
            charts: output.charts,
            images: output.images,
            figures: output.figures,
            indicators: output.indicators,
            messages: describeVisualization(output),
            lastStep: 'visualize',
            stepsVisited: ['visualize'],
        };
    };
}

// ============================================================
// Terminal Nodes
// ============================================================

export function createConsolidateNode(settings: StepNodeSettings & { synthesizer: Synthesizer }) {
    return async (
        state: ConversationState,
        runConfig?: LangGraphRunnableConfig
    ): Promise<ConversationStateUpdate> => {
        const finalResult = await consolidate(state, {
            synthesizer: settings.synthesizer,
            retries: settings.retries,
            retryDelayMs: settings.retryDelayMs,
            previewLength: settings.previewLength,
            signal: runConfig?.signal,
        });

        log.infoWithTrace(state.traceContext, '[CONSOLIDATE] Final result ready', {
            charts: Object.keys(finalResult.charts),
            guardrail: finalResult.metadata.guardrail,
        });

        return { finalResult, lastStep: 'consolidate', stepsVisited: ['consolidate'] };
    };
}

/**
 * Ends the run. Without a consolidated result it builds a best-effort one;
 * with one it only records the step, leaving the result untouched.
 */
export function createFinishNode(settings: Pick<StepNodeSettings, 'previewLength'>) {
    return async (state: ConversationState): Promise<ConversationStateUpdate> => {
        if (state.finalResult) {
            return { lastStep: 'finish' };
        }

        log.infoWithTrace(state.traceContext, '[FINISH] Ending without consolidation', {
            turnCount: state.turnCount,
            ledgerSize: state.ledger.length,
        });

        return {
            finalResult: finishWithoutConsolidation(state, settings.previewLength),
            lastStep: 'finish',
            stepsVisited: ['finish'],
        };
    };
}
