/**
 * Worker Types
 *
 * A worker is a specialist producing one kind of financial analysis. Its
 * output is a tagged variant decided at the worker boundary.
 */

import type { RunContext } from '../context';
import type { ToolTraceStep } from '../ledger';
import { isRecord } from '../shared/guards';
import type { WorkerId } from '../state';

// ============================================================
// Worker Output
// ============================================================

export interface TextWorkerOutput {
    kind: 'text';
    text: string;
}

export interface StructuredWorkerOutput {
    kind: 'structured';
    text: string;
    toolTrace: ToolTraceStep[];
}

export type WorkerOutput = TextWorkerOutput | StructuredWorkerOutput;

export const textResult = (text: string): TextWorkerOutput => ({ kind: 'text', text });

export const structuredResult = (text: string, toolTrace: ToolTraceStep[]): StructuredWorkerOutput => ({
    kind: 'structured',
    text,
    toolTrace,
});

// ============================================================
// Worker Interface
// ============================================================

export interface Worker {
    readonly id: WorkerId;
    readonly description?: string;
    run(queryText: string, context: RunContext, signal?: AbortSignal): Promise<WorkerOutput>;
}

/**
 * Wrap a function with an untyped result as a Worker. The result is
 * normalized into a WorkerOutput when the call returns.
 */
export function createWorker(
    id: WorkerId,
    run: (queryText: string, context: RunContext, signal?: AbortSignal) => Promise<unknown>,
    description?: string
): Worker {
    return {
        id,
        description,
        run: async (queryText, context, signal) => normalizeWorkerOutput(await run(queryText, context, signal)),
    };
}

// ============================================================
// Normalization
// ============================================================

function stringify(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === undefined || value === null) return '';
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

/**
 * Read one tool-trace step from the shapes workers produce:
 * `{toolName, input, observation}`, an agent-executor step
 * `{action: {tool, toolInput}, observation}`, or an `[action, observation]` pair.
 */
export function normalizeToolTraceStep(step: unknown): ToolTraceStep | null {
    if (Array.isArray(step) && step.length === 2) {
        return normalizeToolTraceStep({ action: step[0], observation: step[1] });
    }
    if (!isRecord(step)) return null;

    if (typeof step.toolName === 'string') {
        return { toolName: step.toolName, input: step.input, observation: step.observation };
    }

    const action = step.action;
    if (isRecord(action) && typeof action.tool === 'string') {
        return { toolName: action.tool, input: action.toolInput, observation: step.observation };
    }

    return null;
}

function normalizeToolTrace(trace: unknown): ToolTraceStep[] {
    if (!Array.isArray(trace)) return [];
    const steps: ToolTraceStep[] = [];
    for (const step of trace) {
        const normalized = normalizeToolTraceStep(step);
        if (normalized) steps.push(normalized);
    }
    return steps;
}

/**
 * Turn any worker result into a WorkerOutput. Never throws; unknown shapes
 * are stringified into a text result.
 */
export function normalizeWorkerOutput(raw: unknown): WorkerOutput {
    if (typeof raw === 'string') {
        return textResult(raw);
    }
    if (!isRecord(raw)) {
        return textResult(stringify(raw));
    }

    if (raw.kind === 'text') {
        return textResult(stringify(raw.text));
    }
    if (raw.kind === 'structured') {
        return structuredResult(stringify(raw.text), normalizeToolTrace(raw.toolTrace));
    }

    // Agent-executor shape
    if ('output' in raw) {
        const toolTrace = normalizeToolTrace(raw.intermediateSteps);
        return toolTrace.length > 0
            ? structuredResult(stringify(raw.output), toolTrace)
            : textResult(stringify(raw.output));
    }

    return textResult(stringify(raw));
}
