/**
 * Financial Tools for LangGraph
 *
 * LangChain tools wrapping a FinancialDataSource. Tools are built per run:
 * the run's context decides whose data is queried, never module state.
 */

import { tool } from '@langchain/core/tools';
import { z } from 'zod';
import type { RunContext } from '../context';

// ============================================================
// Result Types
// ============================================================

export interface RiskAssessment {
  risk_level: string;
  risk_score: number;
  positive_factors: string[];
  risks_identified: string[];
  summary: string;
}

export interface FraudAssessment {
  is_fraudulent: boolean;
  confidence_score: number;
  rules_triggered: string[];
  recommended_action: string;
}

/**
 * Pension overview; money values are display strings such as "$45,000"
 */
export interface PensionOverview {
  current_savings: string;
  projected_balance_at_retirement: string;
  years_remaining: number;
  retirement_goal?: string;
  progress_to_goal?: string;
  status?: string;
  target_retirement_age?: number;
  savings_rate?: string;
  annual_contribution?: string;
  assumed_annual_return?: string;
}

export interface ToolError {
  error: string;
}

/**
 * Where the financial tools get their answers. The calculations behind
 * these results live outside this package.
 */
export interface FinancialDataSource {
  analyzeRiskProfile(userId: string, context: RunContext): Promise<RiskAssessment | ToolError>;
  detectFraud(userId: string, context: RunContext): Promise<FraudAssessment | ToolError>;
  projectPension(userId: string, context: RunContext): Promise<PensionOverview | ToolError>;
  searchKnowledgeBase(query: string, userId: string | undefined, context: RunContext): Promise<string>;
}

export const FINANCIAL_TOOL_NAMES = {
  risk: 'analyze_risk_profile',
  fraud: 'detect_fraud',
  projection: 'project_pension',
  knowledge: 'knowledge_base_search',
} as const;

// ============================================================
// Input Helpers
// ============================================================

const userIdSchema = z
  .union([z.number(), z.string()])
  .optional()
  .describe('The numeric ID of the user. Omit it to use the authenticated user.');

/**
 * Accepts 42, "42" or "user 42"; returns undefined when no digits are present
 */
export function coerceUserId(value: string | number | undefined): string | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(Math.trunc(value)) : undefined;
  }
  if (typeof value === 'string') {
    const match = value.match(/\d+/);
    return match ? match[0] : undefined;
  }
  return undefined;
}

/**
 * The run's own user always wins over an id the model supplied
 */
export function resolveUserId(context: RunContext, supplied?: string | number): string | undefined {
  return context.userId ?? coerceUserId(supplied);
}

/**
 * Pull the query out of "user_id=1, query=..." style input; other text is the query itself
 */
export function parseKnowledgeQuery(input: string): { query: string; userId?: string } {
  const userMatch = input.match(/(?:^|[,\s])user_id\s*[:=]\s*(\d+)/i);
  const queryMatch = input.match(/(?:^|[,\s])query\s*[:=]\s*("[^"]*"|'[^']*'|[^,]+)/i);

  let query = input.trim();
  if (queryMatch) {
    query = queryMatch[1].trim().replace(/^(["'])(.*)\1$/, '$2').trim();
  }

  return userMatch ? { query, userId: userMatch[1] } : { query };
}

const missingUser = (): string =>
  JSON.stringify({ error: 'No authenticated user is available for this request.' });

// ============================================================
// Tools
// ============================================================

/**
 * Creates the financial tools for one run
 */
export function createFinancialTools(dataSource: FinancialDataSource, context: RunContext) {
  /**
   * Risk profile assessment
   */
  const analyzeRiskProfileTool = tool(
    async ({ user_id }) => {
      const userId = resolveUserId(context, user_id);
      if (!userId) return missingUser();
      return JSON.stringify(await dataSource.analyzeRiskProfile(userId, context));
    },
    {
      name: FINANCIAL_TOOL_NAMES.risk,
      description:
        'Analyze the risk profile of a user. Returns risk_level, risk_score, positive_factors, risks_identified and a summary.',
      schema: z.object({ user_id: userIdSchema }),
    }
  );

  /**
   * Transaction fraud screening
   */
  const detectFraudTool = tool(
    async ({ user_id }) => {
      const userId = resolveUserId(context, user_id);
      if (!userId) return missingUser();
      return JSON.stringify(await dataSource.detectFraud(userId, context));
    },
    {
      name: FINANCIAL_TOOL_NAMES.fraud,
      description:
        "Check a user's recent transactions for fraud. Returns is_fraudulent, confidence_score, rules_triggered and recommended_action.",
      schema: z.object({ user_id: userIdSchema }),
    }
  );

  /**
   * Pension overview and projection
   */
  const projectPensionTool = tool(
    async ({ user_id }) => {
      const userId = resolveUserId(context, user_id);
      if (!userId) return missingUser();
      return JSON.stringify(await dataSource.projectPension(userId, context));
    },
    {
      name: FINANCIAL_TOOL_NAMES.projection,
      description:
        'Project a user\'s pension: current savings, goal progress, years remaining and projected balance at retirement.',
      schema: z.object({ user_id: userIdSchema }),
    }
  );

  /**
   * General and user-document knowledge search
   */
  const knowledgeBaseSearchTool = tool(
    async ({ input }) => {
      const parsed = parseKnowledgeQuery(input);
      const userId = context.userId ?? parsed.userId;
      const answer = await dataSource.searchKnowledgeBase(parsed.query, userId, context);
      return answer || 'No relevant information found.';
    },
    {
      name: FINANCIAL_TOOL_NAMES.knowledge,
      description:
        'Search the pension knowledge base for general questions. Input is free text, optionally "query=..."',
      schema: z.object({
        input: z.string().describe('The question to search for'),
      }),
    }
  );

  return [analyzeRiskProfileTool, detectFraudTool, projectPensionTool, knowledgeBaseSearchTool];
}

export type FinancialTools = ReturnType<typeof createFinancialTools>;
