/**
 * Financial Advisor
 *
 * Public entry point. Each call to `run` or `stream` owns a fresh state,
 * ledger and run context; nothing is shared between concurrent runs.
 */

import { HARD_TURN_CAP, loadAdvisorConfig, type ResolvedAdvisorConfig } from '../config';
import type { AdvisorCollaborators } from '../collaborators/types';
import { buildFinalResult, bestEffortSummary } from '../consolidation';
import { createRunContext, type RunContext } from '../context';
import { OrchestrationError } from '../errors';
import { createRoutingPolicy, type RoutingPolicy } from '../routing';
import { errorMessage } from '../shared/guards';
import {
    applyStateDelta,
    createInitialState,
    isStepName,
    type ConversationState,
    type ConversationStateUpdate,
    type FinalResult,
    type StepName,
} from '../state';
import { configureAgentLogger, createAgentLogger, createTraceContext, type TraceContext } from '../tracing';
import { WorkerRegistry } from '../workers';
import { buildAdvisorGraph, recursionLimitFor, type CompiledAdvisorGraph } from './graph';

const log = createAgentLogger('FinancialAdvisor');

// ============================================================
// Types
// ============================================================

export interface FinancialAdvisorOptions {
    collaborators: AdvisorCollaborators;
    /** Defaults to loadAdvisorConfig() */
    config?: ResolvedAdvisorConfig;
    /** Replaces the default policy built from the classifier */
    policy?: RoutingPolicy;
}

export interface RunOptions {
    /** Subject whose data this run may query; ignored when `context` is given */
    userId?: string | number;
    context?: RunContext;
    /** Wall-clock limit; overrides the configured runTimeoutMs. 0 disables. */
    timeoutMs?: number;
    signal?: AbortSignal;
    traceContext?: TraceContext;
}

export type AdvisorStep = StepName | 'supervisor';

/**
 * One state transition of a run
 */
export interface AdvisorStreamEvent {
    step: AdvisorStep;
    delta: ConversationStateUpdate;
}

function isAdvisorStep(value: string): value is AdvisorStep {
    return value === 'supervisor' || isStepName(value);
}

// ============================================================
// Implementation
// ============================================================

export class FinancialAdvisor {
    readonly config: ResolvedAdvisorConfig;
    private readonly compiled: CompiledAdvisorGraph;
    private readonly maxTurns: number;

    constructor(options: FinancialAdvisorOptions) {
        this.config = options.config ?? loadAdvisorConfig();
        this.maxTurns = Math.min(this.config.maxTurns, HARD_TURN_CAP);
        configureAgentLogger({ level: this.config.logLevel });

        const retry = { retries: this.config.collaboratorRetries, delayMs: this.config.retryDelayMs };
        const policy =
            options.policy ?? createRoutingPolicy({ classifier: options.collaborators.classifier, retry });

        this.compiled = buildAdvisorGraph({
            policy,
            registry: new WorkerRegistry(options.collaborators.workers),
            synthesizer: options.collaborators.synthesizer,
            rasterizer: options.collaborators.rasterizer,
            maxTurns: this.maxTurns,
            retries: this.config.collaboratorRetries,
            retryDelayMs: this.config.retryDelayMs,
            previewLength: this.config.previewLength,
        }).compile();
    }

    /**
     * Answer one query. Resolves with a result even on timeout (marked partial);
     * rejects only with OrchestrationError.
     */
    async run(query: string, options: RunOptions = {}): Promise<FinalResult> {
        const events = this.stream(query, options);
        for (;;) {
            const step = await events.next();
            if (step.done) {
                return step.value;
            }
        }
    }

    /**
     * Yield one event per state transition; the generator's return value is
     * the final result.
     */
    async *stream(query: string, options: RunOptions = {}): AsyncGenerator<AdvisorStreamEvent, FinalResult> {
        const context = options.context ?? createRunContext({ userId: options.userId });
        const traceContext =
            options.traceContext ?? createTraceContext(query, { requestId: context.requestId });
        let snapshot: ConversationState = createInitialState(query, context, traceContext);

        const controller = new AbortController();
        const timeoutMs = options.timeoutMs ?? this.config.runTimeoutMs;
        const timer = timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
        const forwardAbort = () => controller.abort();
        if (options.signal?.aborted) {
            controller.abort();
        } else {
            options.signal?.addEventListener('abort', forwardAbort, { once: true });
        }

        log.infoWithTrace(traceContext, '[ADVISOR] Starting run', {
            requestId: context.requestId,
            maxTurns: this.maxTurns,
            timeoutMs,
        });

        try {
            const updates = await this.compiled.stream(snapshot, {
                streamMode: 'updates',
                recursionLimit: recursionLimitFor(this.maxTurns),
                signal: controller.signal,
            });

            for await (const chunk of updates) {
                for (const [node, update] of Object.entries(chunk)) {
                    if (!isAdvisorStep(node)) continue;
                    const delta: ConversationStateUpdate = update ?? {};
                    snapshot = applyStateDelta(snapshot, delta);
                    yield { step: node, delta };
                }
            }
        } catch (error) {
            if (controller.signal.aborted) {
                log.warnWithTrace(traceContext, '[ADVISOR] Run interrupted, returning partial result', {
                    turnCount: snapshot.turnCount,
                    ledgerSize: snapshot.ledger.length,
                });
                return (
                    snapshot.finalResult ??
                    buildFinalResult(snapshot, bestEffortSummary(snapshot, this.config.previewLength), {
                        partial: true,
                    })
                );
            }

            log.errorWithTrace(traceContext, '[ADVISOR] Run failed', { error: errorMessage(error) });
            throw new OrchestrationError(`Advisor run failed: ${errorMessage(error)}`, {
                ledger: snapshot.ledger,
                turnCount: snapshot.turnCount,
                traceId: traceContext.traceId,
                cause: error,
            });
        } finally {
            if (timer) clearTimeout(timer);
            options.signal?.removeEventListener('abort', forwardAbort);
        }

        if (!snapshot.finalResult) {
            throw new OrchestrationError('Advisor run ended without a result', {
                ledger: snapshot.ledger,
                turnCount: snapshot.turnCount,
                traceId: traceContext.traceId,
            });
        }

        log.infoWithTrace(traceContext, '[ADVISOR] Run complete', {
            turnCount: snapshot.turnCount,
            steps: snapshot.finalResult.metadata.stepsVisited,
            partial: snapshot.finalResult.metadata.partial,
        });

        return snapshot.finalResult;
    }
}
