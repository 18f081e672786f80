/**
 * Consolidation Step
 *
 * Synthesizes the final narrative, screens it, and bundles it with the
 * chart payloads into the run's final result.
 */

import { isAbortError, withRetry } from '../collaborators/retry';
import type { Synthesizer } from '../collaborators/types';
import { errorMessage } from '../shared/guards';
import type { ConversationState, FinalResult } from '../state';
import { createAgentLogger } from '../tracing';
import { bestEffortSummary, buildFinalResult } from './final-result';
import { applyGuardrail, buildDataPreview, type GuardrailCategory, GUARDRAIL_CATEGORIES } from './guardrail';
import { fallbackSummary } from './synthesizer';

const log = createAgentLogger('Consolidate');

export interface ConsolidateOptions {
  synthesizer: Synthesizer;
  retries?: number;
  retryDelayMs?: number;
  previewLength?: number;
  guardrailCategories?: readonly GuardrailCategory[];
  signal?: AbortSignal;
}

async function synthesizeNarrative(state: ConversationState, options: ConsolidateOptions): Promise<string> {
  const { synthesizer, retries = 1, retryDelayMs = 0, signal } = options;

  try {
    const narrative = await withRetry(() => synthesizer.synthesize(state.messages, state.runContext), {
      retries,
      delayMs: retryDelayMs,
      signal,
      operation: 'synthesis',
      traceContext: state.traceContext,
    });
    if (typeof narrative === 'string' && narrative.trim()) {
      return narrative;
    }
    log.warnWithTrace(state.traceContext, 'Synthesizer returned nothing, using fallback');
  } catch (error) {
    if (isAbortError(error) || signal?.aborted) throw error;
    log.warnWithTrace(state.traceContext, 'Synthesizer unavailable, using fallback', {
      error: errorMessage(error),
    });
  }

  return fallbackSummary(state.messages);
}

export async function consolidate(state: ConversationState, options: ConsolidateOptions): Promise<FinalResult> {
  const { previewLength, guardrailCategories = GUARDRAIL_CATEGORIES } = options;

  const narrative = await synthesizeNarrative(state, options);
  const screened = applyGuardrail(narrative, buildDataPreview(state.ledger, previewLength), guardrailCategories);

  if (screened.blocked) {
    log.warnWithTrace(state.traceContext, 'Guardrail replaced narrative', { categories: screened.categories });
  }

  return buildFinalResult(state, screened.text, {
    step: 'consolidate',
    guardrail: screened.categories,
    partial: false,
  });
}

/**
 * Result for a run that ends without consolidation
 */
export function finishWithoutConsolidation(state: ConversationState, previewLength?: number): FinalResult {
  return buildFinalResult(state, bestEffortSummary(state, previewLength), {
    step: 'finish',
    partial: true,
  });
}
