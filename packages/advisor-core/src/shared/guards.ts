/**
 * Narrowing helpers for values crossing a collaborator boundary.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn a thrown value into a message for logs and diagnostics
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
