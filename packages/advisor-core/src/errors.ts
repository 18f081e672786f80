/**
 * Error types surfaced by advisor-core.
 *
 * Component-local failures (a worker returning junk, a classifier being
 * unavailable, a chart failing to render) are absorbed inside the run and
 * never reach the caller as exceptions. Only the types below do.
 */

import type { LedgerEntry } from './ledger';

/**
 * Unexpected fault inside the step-execution boundary.
 *
 * Carries whatever ledger the run had gathered so the caller can still
 * inspect or display partial data.
 */
export class OrchestrationError extends Error {
    readonly code = 'ORCHESTRATION_FAILED';
    readonly ledger: readonly LedgerEntry[];
    readonly turnCount: number;
    readonly traceId?: string;

    constructor(
        message: string,
        details: {
            ledger?: readonly LedgerEntry[];
            turnCount?: number;
            traceId?: string;
            cause?: unknown;
        } = {}
    ) {
        super(message, { cause: details.cause });
        this.name = 'OrchestrationError';
        this.ledger = details.ledger ?? [];
        this.turnCount = details.turnCount ?? 0;
        this.traceId = details.traceId;
    }
}

/**
 * Invalid configuration value that cannot be clamped into range
 */
export class ConfigError extends Error {
    readonly code = 'INVALID_CONFIG';

    constructor(
        message: string,
        readonly field: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}
