/**
 * Fixture Data Source
 *
 * Serves canned tool results from a JSON document. Used by the CLI and tests.
 */

import { z } from 'zod';
import type { FinancialDataSource, ToolError } from './financial-tools';

const riskSchema = z.object({
  risk_level: z.string(),
  risk_score: z.number(),
  positive_factors: z.array(z.string()).default([]),
  risks_identified: z.array(z.string()).default([]),
  summary: z.string().default(''),
});

const fraudSchema = z.object({
  is_fraudulent: z.boolean(),
  confidence_score: z.number(),
  rules_triggered: z.array(z.string()).default([]),
  recommended_action: z.string(),
});

const pensionSchema = z.object({
  current_savings: z.string(),
  projected_balance_at_retirement: z.string(),
  years_remaining: z.number(),
  retirement_goal: z.string().optional(),
  progress_to_goal: z.string().optional(),
  status: z.string().optional(),
  target_retirement_age: z.number().optional(),
  savings_rate: z.string().optional(),
  annual_contribution: z.string().optional(),
  assumed_annual_return: z.string().optional(),
});

export const fixtureDataSchema = z.object({
  profiles: z.record(
    z.object({
      risk: riskSchema.optional(),
      fraud: fraudSchema.optional(),
      projection: pensionSchema.optional(),
    })
  ),
  knowledge: z
    .array(
      z.object({
        keywords: z.array(z.string()).min(1),
        answer: z.string(),
      })
    )
    .default([]),
});

export type FixtureData = z.infer<typeof fixtureDataSchema>;

export type FixtureProfile = FixtureData['profiles'][string];

/**
 * Validate raw JSON into fixture data. Throws a ZodError on bad input.
 */
export function parseFixtureData(raw: unknown): FixtureData {
  return fixtureDataSchema.parse(raw);
}

const notFound = (userId: string): ToolError => ({
  error: `No pension data found for User ID: ${userId}`,
});

export function createFixtureDataSource(data: FixtureData): FinancialDataSource {
  const profileFor = (userId: string): FixtureProfile | undefined => data.profiles[userId];

  return {
    analyzeRiskProfile: async (userId) => profileFor(userId)?.risk ?? notFound(userId),
    detectFraud: async (userId) => profileFor(userId)?.fraud ?? notFound(userId),
    projectPension: async (userId) => profileFor(userId)?.projection ?? notFound(userId),
    searchKnowledgeBase: async (query) => {
      const lowered = query.toLowerCase();
      return data.knowledge
        .filter((entry) => entry.keywords.some((keyword) => lowered.includes(keyword.toLowerCase())))
        .slice(0, 3)
        .map((entry) => entry.answer)
        .join('\n');
    },
  };
}
