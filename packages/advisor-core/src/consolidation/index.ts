/**
 * Consolidation Module
 */

export {
  type GuardrailCategory,
  type GuardrailResult,
  GUARDRAIL_CATEGORIES,
  DEFAULT_DATA_PREVIEW_LENGTH,
  detectBlockedCategories,
  buildDataPreview,
  refusalMessage,
  applyGuardrail,
} from './guardrail';

export {
  type LLMSynthesizerOptions,
  NO_DATA_NOTICE,
  fallbackSummary,
  createLLMSynthesizer,
} from './synthesizer';

export { type FinalResultOptions, buildFinalResult, bestEffortSummary } from './final-result';

export { type ConsolidateOptions, consolidate, finishWithoutConsolidation } from './consolidate-step';
