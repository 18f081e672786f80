/**
 * Worker Adapter
 *
 * Invokes one specialist worker with the latest user request and turns its
 * output into messages and ledger entries.
 */

import { isAbortError, withRetry } from '../collaborators/retry';
import {
    createLedgerEntry,
    DEFAULT_PREVIEW_LENGTH,
    previewObservation,
    type LedgerEntry,
} from '../ledger';
import { findLatestUserText, systemNote, workerMessage, type ConversationMessage } from '../messages';
import { errorMessage } from '../shared/guards';
import type { ConversationState, WorkerId } from '../state';
import { createAgentLogger, createChildSpan, startTimer } from '../tracing';
import { normalizeWorkerOutput, type Worker, type WorkerOutput } from './types';

const log = createAgentLogger('WorkerAdapter');

export interface WorkerStateDelta {
    appendedMessages: ConversationMessage[];
    appendedLedgerEntries: LedgerEntry[];
}

export interface InvokeWorkerOptions {
    previewLength?: number;
    retries?: number;
    retryDelayMs?: number;
    signal?: AbortSignal;
}

function diagnostic(workerId: WorkerId, content: string): WorkerStateDelta {
    return {
        appendedMessages: [systemNote(content, { source: workerId, diagnostic: true })],
        appendedLedgerEntries: [],
    };
}

/**
 * Human-readable summary of a worker's output with bounded tool previews
 */
export function summarizeWorkerOutput(output: WorkerOutput, previewLength = DEFAULT_PREVIEW_LENGTH): string {
    const lines: string[] = [];
    if (output.text.trim()) {
        lines.push(output.text.trim());
    }
    if (output.kind === 'structured') {
        for (const step of output.toolTrace) {
            lines.push(`Tool ${step.toolName} returned: ${previewObservation(step.observation, previewLength)}`);
        }
    }
    return lines.join('\n');
}

/**
 * Run one worker against the state and return what it adds.
 *
 * Never throws for a missing request, a missing worker, a failing worker or
 * malformed output; those become diagnostic messages. Aborts propagate.
 */
export async function invokeWorker(
    workerId: WorkerId,
    worker: Worker | undefined,
    state: Pick<ConversationState, 'messages' | 'runContext' | 'traceContext'>,
    options: InvokeWorkerOptions = {}
): Promise<WorkerStateDelta> {
    const { previewLength = DEFAULT_PREVIEW_LENGTH, retries = 1, retryDelayMs = 0, signal } = options;
    const span = state.traceContext ? createChildSpan(state.traceContext, `worker:${workerId}`) : undefined;

    const queryText = findLatestUserText(state.messages);
    if (queryText === null) {
        log.warnWithTrace(span, 'No user message found, skipping worker', { workerId });
        return diagnostic(workerId, `No user request was found for the ${workerId} worker.`);
    }

    if (!worker) {
        log.warnWithTrace(span, 'Worker not registered', { workerId });
        return diagnostic(workerId, `No ${workerId} worker is available.`);
    }

    const timer = startTimer(log, `worker:${workerId}`, span);
    let output: WorkerOutput;
    try {
        const raw = await withRetry(() => worker.run(queryText, state.runContext, signal), {
            retries,
            delayMs: retryDelayMs,
            signal,
            operation: `${workerId} worker`,
            traceContext: span,
        });
        output = normalizeWorkerOutput(raw);
    } catch (error) {
        if (isAbortError(error) || signal?.aborted) {
            throw error;
        }
        timer.endSilent();
        log.errorWithTrace(span, 'Worker failed', { workerId, error: errorMessage(error) });
        return diagnostic(workerId, `The ${workerId} worker could not complete: ${errorMessage(error)}`);
    }

    const appendedLedgerEntries =
        output.kind === 'structured'
            ? output.toolTrace.map((step) => createLedgerEntry(workerId, step))
            : [];
    const summary = summarizeWorkerOutput(output, previewLength);

    timer.end('Worker finished', { workerId, ledgerEntries: appendedLedgerEntries.length });

    if (!summary) {
        return diagnostic(workerId, `The ${workerId} worker returned no output.`);
    }

    return {
        appendedMessages: [workerMessage(workerId, summary)],
        appendedLedgerEntries,
    };
}
