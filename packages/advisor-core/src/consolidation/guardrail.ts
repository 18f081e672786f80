/**
 * Content Guardrail
 *
 * Screens the synthesized narrative for topics the advisor must not speak
 * to. Raw worker data shown elsewhere is not screened.
 */

import { previewObservation, type LedgerEntry } from '../ledger';

// ============================================
// Categories
// ============================================

export interface GuardrailCategory {
  id: string;
  description: string;
  patterns: readonly RegExp[];
}

export const GUARDRAIL_CATEGORIES: readonly GuardrailCategory[] = [
  {
    id: 'religion',
    description: 'Religious topics',
    patterns: [/\b(religio\w*|church|mosque|temple|synagogue|pray\w*|bible|quran|torah)\b/i],
  },
  {
    id: 'politics',
    description: 'Political topics',
    patterns: [/\b(politic\w*|election\w*|voting|democrat\w*|republican\w*|parliament\w*)\b/i],
  },
  {
    id: 'investment-instruction',
    description: 'Specific buy or sell instructions',
    patterns: [
      /\b(you should|i recommend|we recommend|i suggest)\s+(buy|sell|short)(ing)?\b/i,
      /\b(buy|sell|short)\s+(shares|stocks?|bonds?|options|units)\s+(of|in)\b/i,
      /\bstrong\s+(buy|sell)\b/i,
    ],
  },
  {
    id: 'speculative-crypto',
    description: 'Speculative crypto assets',
    patterns: [/\b(bitcoin|btc|ethereum|dogecoin|crypto\w*|nfts?)\b/i],
  },
];

export const DEFAULT_DATA_PREVIEW_LENGTH = 200;

// ============================================
// Detection
// ============================================

export interface GuardrailResult {
  text: string;
  blocked: boolean;
  /** Ids of the categories that matched */
  categories: string[];
}

export function detectBlockedCategories(
  text: string,
  categories: readonly GuardrailCategory[] = GUARDRAIL_CATEGORIES
): string[] {
  return categories
    .filter((category) => category.patterns.some((pattern) => pattern.test(text)))
    .map((category) => category.id);
}

/**
 * One line per ledger entry, each observation cut to `maxLength`
 */
export function buildDataPreview(
  ledger: readonly LedgerEntry[],
  maxLength = DEFAULT_DATA_PREVIEW_LENGTH
): string {
  if (ledger.length === 0) {
    return 'No financial data was gathered for this request.';
  }
  return ledger
    .map((entry) => `- ${entry.toolName}: ${previewObservation(entry.output, maxLength)}`)
    .join('\n');
}

export function refusalMessage(dataPreview: string): string {
  return [
    'I can only help with your pension, risk profile, fraud checks and savings projections, so I cannot comment on that topic.',
    '',
    'Here is the data gathered for your request:',
    dataPreview,
  ].join('\n');
}

/**
 * Replace the narrative with the refusal template when any category matches
 */
export function applyGuardrail(
  narrative: string,
  dataPreview: string,
  categories: readonly GuardrailCategory[] = GUARDRAIL_CATEGORIES
): GuardrailResult {
  const matched = detectBlockedCategories(narrative, categories);
  if (matched.length === 0) {
    return { text: narrative, blocked: false, categories: [] };
  }
  return { text: refusalMessage(dataPreview), blocked: true, categories: matched };
}
