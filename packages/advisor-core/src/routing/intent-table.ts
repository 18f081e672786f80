/**
 * Intent Tables
 *
 * Keyword rules used by routing, kept as data so they can be inspected and
 * tested on their own.
 */

import { hasToolResult, type LedgerEntry } from '../ledger';
import type { StepName } from '../state';
import { FINANCIAL_TOOL_NAMES } from '../workers/financial-tools';

// ============================================================
// Post-worker visualization rules
// ============================================================

export interface VisualizationRule {
  id: string;
  /** Any keyword present in the lower-cased user text satisfies the rule's text part */
  keywords: readonly string[];
  /** Tool result that must already be in the ledger */
  requiresTool?: string;
}

export const VISUALIZATION_RULES: readonly VisualizationRule[] = [
  {
    id: 'explicit-visual',
    keywords: ['chart', 'graph', 'visual', 'plot', 'show me', 'display', 'diagram'],
  },
  {
    id: 'projection-trend',
    keywords: ['growth', 'grow', 'progress', 'goal', 'retirement', 'projection', 'trend', 'over time'],
    requiresTool: FINANCIAL_TOOL_NAMES.projection,
  },
  {
    id: 'risk-data',
    keywords: ['risk'],
    requiresTool: FINANCIAL_TOOL_NAMES.risk,
  },
  {
    id: 'fraud-data',
    keywords: ['fraud'],
    requiresTool: FINANCIAL_TOOL_NAMES.fraud,
  },
];

/**
 * Rules whose keyword and data preconditions both hold
 */
export function matchVisualizationRules(
  userText: string,
  ledger: readonly LedgerEntry[],
  rules: readonly VisualizationRule[] = VISUALIZATION_RULES
): VisualizationRule[] {
  const lowered = userText.toLowerCase();
  return rules.filter(
    (rule) =>
      rule.keywords.some((keyword) => lowered.includes(keyword)) &&
      (rule.requiresTool === undefined || hasToolResult(ledger, rule.requiresTool))
  );
}

// ============================================================
// Classifier routes
// ============================================================

/**
 * Steps a classifier may pick for a fresh query
 */
export type ClassifiedRoute = Extract<StepName, 'risk' | 'fraud' | 'projection' | 'consolidate' | 'finish'>;

/**
 * Accepted spellings for each route, including the agent-style names
 * (risk_analyst, summarizer, FINISH) supervisor prompts tend to produce
 */
export const ROUTE_ALIASES: Readonly<Record<string, ClassifiedRoute>> = {
  risk: 'risk',
  risk_analyst: 'risk',
  fraud: 'fraud',
  fraud_detector: 'fraud',
  projection: 'projection',
  projection_specialist: 'projection',
  consolidate: 'consolidate',
  summarizer: 'consolidate',
  finish: 'finish',
};

/**
 * Map a classifier's answer to a route; null when unrecognized
 */
export function coerceRoute(raw: unknown): ClassifiedRoute | null {
  if (typeof raw !== 'string') return null;
  const key = raw.trim().replace(/^["'`]+|["'`.]+$/g, '').toLowerCase();
  return Object.prototype.hasOwnProperty.call(ROUTE_ALIASES, key) ? ROUTE_ALIASES[key] : null;
}

// ============================================================
// Heuristic classifier rules
// ============================================================

export interface ClassifierRule {
  route: ClassifiedRoute;
  keywords: readonly string[];
  weight: number;
}

export const DEFAULT_CLASSIFIER_RULES: readonly ClassifierRule[] = [
  {
    route: 'fraud',
    keywords: ['fraud', 'suspicious', 'scam', 'unauthorized', 'unusual transaction', 'stolen'],
    weight: 1,
  },
  {
    route: 'risk',
    keywords: ['risk', 'volatility', 'volatile', 'diversif', 'portfolio', 'exposure'],
    weight: 0.9,
  },
  {
    route: 'projection',
    keywords: ['pension', 'retire', 'projection', 'project', 'savings', 'grow', 'in 10 years', 'future balance'],
    weight: 0.8,
  },
  {
    route: 'finish',
    keywords: ['goodbye', 'bye', 'thank you', 'thanks', 'that is all', "that's all"],
    weight: 1.2,
  },
];
