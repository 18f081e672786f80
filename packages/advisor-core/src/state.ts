/**
 * Conversation State
 *
 * The single aggregate threaded through every step of one advisor run.
 */

import { Annotation } from '@langchain/langgraph';
import type { RunContext } from './context';
import type { LedgerEntry } from './ledger';
import { userMessage, type ConversationMessage } from './messages';
import type { TraceContext } from './tracing';
import type { IndicatorValue, PlotlyFigure, VegaLiteSpec } from './visualization/types';

// ============================================================
// Step Names
// ============================================================

export const WORKER_IDS = ['risk', 'fraud', 'projection'] as const;

export type WorkerId = (typeof WORKER_IDS)[number];

export const STEP_NAMES = [...WORKER_IDS, 'visualize', 'consolidate', 'finish'] as const;

export type StepName = (typeof STEP_NAMES)[number];

export function isWorkerId(value: unknown): value is WorkerId {
    return typeof value === 'string' && WORKER_IDS.some((id) => id === value);
}

export function isStepName(value: unknown): value is StepName {
    return typeof value === 'string' && STEP_NAMES.some((step) => step === value);
}

// ============================================================
// Final Result
// ============================================================

export interface FinalResultMetadata {
    turnCount: number;
    stepsVisited: StepName[];
    ledgerSize: number;
    /** Guardrail categories that replaced the narrative, if any */
    guardrail: string[];
    /** Built from the ledger without a consolidation pass */
    partial: boolean;
    traceId?: string;
}

export interface FinalResult {
    summaryText: string;
    charts: Record<string, VegaLiteSpec>;
    images: Record<string, string>;
    figures: Record<string, PlotlyFigure>;
    indicators: Record<string, IndicatorValue>;
    metadata: FinalResultMetadata;
}

// ============================================================
// Reducer Functions
// ============================================================

/**
 * Append-only reducer for arrays
 */
export function appendReducer<T>(existing: T[] | undefined, update: T[] | undefined): T[] {
    if (!update || update.length === 0) return existing ?? [];
    if (!existing) return [...update];
    return [...existing, ...update];
}

/**
 * Merge reducer for keyed maps, last write wins per key
 */
export function mergeReducer<V>(
    existing: Record<string, V> | undefined,
    update: Record<string, V> | undefined
): Record<string, V> {
    if (!update) return existing ?? {};
    if (!existing) return { ...update };
    return { ...existing, ...update };
}

/**
 * Turn counter never moves backward
 */
export function turnReducer(existing: number | undefined, update: number | undefined): number {
    return Math.max(existing ?? 0, update ?? 0);
}

/**
 * First final result wins; later writes are ignored
 */
export function finalResultReducer(
    existing: FinalResult | undefined,
    update: FinalResult | undefined
): FinalResult | undefined {
    return existing ?? update;
}

// ============================================================
// State Annotation
// ============================================================

export const ConversationStateAnnotation = Annotation.Root({
    // ============ Conversation ============
    messages: Annotation<ConversationMessage[]>({
        default: () => [],
        reducer: appendReducer,
    }),

    // ============ Routing ============
    /** Step chosen for the upcoming turn */
    next: Annotation<StepName | undefined>(),

    /** Step executed most recently */
    lastStep: Annotation<StepName | undefined>(),

    stepsVisited: Annotation<StepName[]>({
        default: () => [],
        reducer: appendReducer,
    }),

    turnCount: Annotation<number>({
        default: () => 0,
        reducer: turnReducer,
    }),

    // ============ Ledger ============
    ledger: Annotation<LedgerEntry[]>({
        default: () => [],
        reducer: appendReducer,
    }),

    /** Ledger length at the last routing decision */
    ledgerMark: Annotation<number>({
        default: () => 0,
        reducer: (existing, update) => update ?? existing ?? 0,
    }),

    // ============ Visualization ============
    charts: Annotation<Record<string, VegaLiteSpec>>({
        default: () => ({}),
        reducer: mergeReducer,
    }),

    /** Rendered chart images as data URIs */
    images: Annotation<Record<string, string>>({
        default: () => ({}),
        reducer: mergeReducer,
    }),

    figures: Annotation<Record<string, PlotlyFigure>>({
        default: () => ({}),
        reducer: mergeReducer,
    }),

    indicators: Annotation<Record<string, IndicatorValue>>({
        default: () => ({}),
        reducer: mergeReducer,
    }),

    // ============ Output ============
    finalResult: Annotation<FinalResult | undefined>({
        default: () => undefined,
        reducer: finalResultReducer,
    }),

    // ============ Run Scope ============
    runContext: Annotation<RunContext>(),

    traceContext: Annotation<TraceContext | undefined>(),
});

export type ConversationState = typeof ConversationStateAnnotation.State;

export type ConversationStateUpdate = typeof ConversationStateAnnotation.Update;

// ============================================================
// State Helpers
// ============================================================

/**
 * Fresh state for one run, seeded with the single user message
 */
export function createInitialState(
    query: string,
    context: RunContext,
    traceContext?: TraceContext
): ConversationState {
    return {
        messages: [userMessage(query)],
        next: undefined,
        lastStep: undefined,
        stepsVisited: [],
        turnCount: 0,
        ledger: [],
        ledgerMark: 0,
        charts: {},
        images: {},
        figures: {},
        indicators: {},
        finalResult: undefined,
        runContext: context,
        traceContext,
    };
}

/**
 * Fold a node's update into a snapshot with the same reducers the graph uses.
 * A terminal snapshot is returned unchanged.
 */
export function applyStateDelta(
    state: ConversationState,
    delta: ConversationStateUpdate
): ConversationState {
    if (state.finalResult) {
        return state;
    }

    return {
        messages: appendReducer(state.messages, delta.messages),
        next: 'next' in delta ? delta.next : state.next,
        lastStep: 'lastStep' in delta ? delta.lastStep : state.lastStep,
        stepsVisited: appendReducer(state.stepsVisited, delta.stepsVisited),
        turnCount: turnReducer(state.turnCount, delta.turnCount),
        ledger: appendReducer(state.ledger, delta.ledger),
        ledgerMark: delta.ledgerMark ?? state.ledgerMark,
        charts: mergeReducer(state.charts, delta.charts),
        images: mergeReducer(state.images, delta.images),
        figures: mergeReducer(state.figures, delta.figures),
        indicators: mergeReducer(state.indicators, delta.indicators),
        finalResult: finalResultReducer(state.finalResult, delta.finalResult),
        runContext: delta.runContext ?? state.runContext,
        traceContext: 'traceContext' in delta ? delta.traceContext : state.traceContext,
    };
}

/**
 * Whether any chart payload has been produced
 */
export function hasChartPayload(state: Pick<ConversationState, 'charts' | 'images' | 'figures'>): boolean {
    return (
        Object.keys(state.charts).length > 0 ||
        Object.keys(state.images).length > 0 ||
        Object.keys(state.figures).length > 0
    );
}
