/**
 * Routing Policy
 *
 * Decides the step after each supervisor turn:
 * 1. charts already produced, or visualization already ran → consolidate
 * 2. a worker just ran → visualize if the request asks for it, else consolidate
 * 3. fresh query → ask the classifier; failure or nonsense → finish
 */

import { isAbortError, withRetry, type RetryOptions } from '../collaborators/retry';
import type { IntentClassifier } from '../collaborators/types';
import { findLatestUserText, renderTranscript } from '../messages';
import { errorMessage } from '../shared/guards';
import { hasChartPayload, isWorkerId, type ConversationState, type StepName } from '../state';
import { createAgentLogger } from '../tracing';
import { coerceRoute, matchVisualizationRules, VISUALIZATION_RULES, type VisualizationRule } from './intent-table';

const log = createAgentLogger('RoutingPolicy');

// ============================================================
// Types
// ============================================================

export type RoutingReason =
    | 'terminal-data'
    | 'visualization-requested'
    | 'no-visualization'
    | 'classified'
    | 'classifier-unrecognized'
    | 'classifier-failed';

export interface RoutingDecision {
    next: StepName;
    reason: RoutingReason;
    /** Visualization rules that fired, for post-worker decisions */
    matchedRules?: string[];
    /** Raw classifier answer, for fresh-query decisions */
    classifierOutput?: string;
}

export type RoutingState = Pick<
    ConversationState,
    'messages' | 'ledger' | 'ledgerMark' | 'lastStep' | 'stepsVisited' | 'charts' | 'images' | 'figures' | 'runContext' | 'traceContext'
>;

export interface RoutingPolicy {
    decide(state: RoutingState, signal?: AbortSignal): Promise<StepName>;
    evaluate(state: RoutingState, signal?: AbortSignal): Promise<RoutingDecision>;
}

export interface RoutingPolicyOptions {
    classifier: IntentClassifier;
    rules?: readonly VisualizationRule[];
    retry?: Pick<RetryOptions, 'retries' | 'delayMs'>;
}

// ============================================================
// Deterministic phases
// ============================================================

/**
 * Whether a worker has run since the last routing decision
 */
export function workerJustRan(state: Pick<RoutingState, 'ledger' | 'ledgerMark' | 'lastStep'>): boolean {
    return state.ledger.length > state.ledgerMark || isWorkerId(state.lastStep);
}

/**
 * Phases 1 and 2. Null means the state carries no data yet and the
 * classifier must decide.
 */
export function routeFromState(
    state: RoutingState,
    rules: readonly VisualizationRule[] = VISUALIZATION_RULES
): RoutingDecision | null {
    if (hasChartPayload(state) || state.stepsVisited.includes('visualize')) {
        return { next: 'consolidate', reason: 'terminal-data' };
    }

    if (workerJustRan(state)) {
        const userText = findLatestUserText(state.messages) ?? '';
        const matched = matchVisualizationRules(userText, state.ledger, rules);
        return matched.length > 0
            ? { next: 'visualize', reason: 'visualization-requested', matchedRules: matched.map((r) => r.id) }
            : { next: 'consolidate', reason: 'no-visualization', matchedRules: [] };
    }

    return null;
}

// ============================================================
// Policy
// ============================================================

export function createRoutingPolicy(options: RoutingPolicyOptions): RoutingPolicy {
    const { classifier, rules = VISUALIZATION_RULES, retry = {} } = options;

    const evaluate = async (state: RoutingState, signal?: AbortSignal): Promise<RoutingDecision> => {
        const fromState = routeFromState(state, rules);
        if (fromState) {
            return fromState;
        }

        let raw: string;
        try {
            raw = await withRetry(() => classifier.classify(renderTranscript(state.messages), state.runContext), {
                ...retry,
                signal,
                operation: 'intent classification',
                traceContext: state.traceContext,
            });
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) {
                throw error;
            }
            log.warnWithTrace(state.traceContext, 'Classifier unavailable, finishing', {
                error: errorMessage(error),
            });
            return { next: 'finish', reason: 'classifier-failed' };
        }

        const route = coerceRoute(raw);
        if (route === null) {
            log.warnWithTrace(state.traceContext, 'Unrecognized classifier output, finishing', { output: raw });
            return { next: 'finish', reason: 'classifier-unrecognized', classifierOutput: raw };
        }

        return { next: route, reason: 'classified', classifierOutput: raw };
    };

    return {
        evaluate,
        decide: async (state, signal) => (await evaluate(state, signal)).next,
    };
}
