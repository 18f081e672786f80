/**
 * Tool-Result Ledger
 *
 * Append-only record of every worker tool invocation in a run. Entries keep
 * the full observation payload; only the human-readable preview is bounded.
 */

import truncate from 'json-truncate';
import { isRecord } from '../shared/guards';

export interface LedgerEntry {
  workerName: string;
  toolName: string;
  input: unknown;
  output: unknown;
  recordedAt: string;
}

/**
 * One step of a worker's tool trace, before it is attributed to a worker
 */
export interface ToolTraceStep {
  toolName: string;
  input: unknown;
  observation: unknown;
}

export const DEFAULT_PREVIEW_LENGTH = 200;

const PREVIEW_MAX_DEPTH = 3;

export function createLedgerEntry(workerName: string, step: ToolTraceStep): LedgerEntry {
  return {
    workerName,
    toolName: step.toolName,
    input: step.input,
    output: step.observation,
    recordedAt: new Date().toISOString(),
  };
}

/**
 * First entry recorded for a tool, in insertion order
 */
export function firstEntryForTool(
  ledger: readonly LedgerEntry[],
  toolName: string
): LedgerEntry | undefined {
  return ledger.find((entry) => entry.toolName === toolName);
}

/**
 * Whether a tool produced usable data: a parsed observation without an `error` key
 */
export function hasToolResult(ledger: readonly LedgerEntry[], toolName: string): boolean {
  return ledger.some((entry) => {
    if (entry.toolName !== toolName) return false;
    const observation = parseObservation(entry.output);
    return observation !== null && !('error' in observation);
  });
}

/**
 * Text preview of an observation, at most `maxLength` characters plus an ellipsis
 */
export function previewObservation(output: unknown, maxLength = DEFAULT_PREVIEW_LENGTH): string {
  let text: string;
  if (typeof output === 'string') {
    text = output;
  } else if (output === undefined) {
    text = 'undefined';
  } else {
    try {
      text = JSON.stringify(truncate(output, { maxDepth: PREVIEW_MAX_DEPTH, replace: '[...]' })) ?? String(output);
    } catch {
      text = String(output);
    }
  }

  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Observation as a record, parsing JSON text when a tool returned a string
 */
export function parseObservation(output: unknown): Record<string, unknown> | null {
  if (isRecord(output)) return output;
  if (typeof output !== 'string') return null;

  try {
    const parsed: unknown = JSON.parse(output);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
