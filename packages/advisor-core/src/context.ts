/**
 * Per-run context
 *
 * Everything a run's collaborators need to know about "whose request this
 * is" travels in a RunContext passed explicitly through every call.
 */

import { v4 as uuidv4 } from 'uuid';

export interface RunContext {
    /** Subject whose financial data the workers may query */
    userId?: string;
    requestId: string;
    metadata: Record<string, unknown>;
}

export function createRunContext(
    options: { userId?: string | number; requestId?: string; metadata?: Record<string, unknown> } = {}
): RunContext {
    return {
        ...(options.userId !== undefined ? { userId: String(options.userId) } : {}),
        requestId: options.requestId ?? `req_${uuidv4()}`,
        metadata: { ...options.metadata },
    };
}
