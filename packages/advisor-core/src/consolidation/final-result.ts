/**
 * Final result assembly shared by consolidation, the finish step and
 * interrupted runs.
 */

import type { ConversationState, FinalResult, StepName } from '../state';
import { buildDataPreview } from './guardrail';
import { fallbackSummary } from './synthesizer';

export interface FinalResultOptions {
  /** Step producing the result, appended to `stepsVisited` */
  step?: StepName;
  guardrail?: string[];
  partial: boolean;
}

export function buildFinalResult(
  state: Pick<
    ConversationState,
    'turnCount' | 'stepsVisited' | 'ledger' | 'charts' | 'images' | 'figures' | 'indicators' | 'traceContext'
  >,
  summaryText: string,
  options: FinalResultOptions
): FinalResult {
  return {
    summaryText,
    charts: { ...state.charts },
    images: { ...state.images },
    figures: { ...state.figures },
    indicators: { ...state.indicators },
    metadata: {
      turnCount: state.turnCount,
      stepsVisited: options.step ? [...state.stepsVisited, options.step] : [...state.stepsVisited],
      ledgerSize: state.ledger.length,
      guardrail: options.guardrail ?? [],
      partial: options.partial,
      ...(state.traceContext ? { traceId: state.traceContext.traceId } : {}),
    },
  };
}

/**
 * Summary built from what the run gathered, without synthesis
 */
export function bestEffortSummary(
  state: Pick<ConversationState, 'messages' | 'ledger'>,
  previewLength?: number
): string {
  if (state.ledger.length === 0) {
    return fallbackSummary(state.messages);
  }
  return `Here is what I found so far:\n${buildDataPreview(state.ledger, previewLength)}`;
}
