/**
 * Fake collaborators for advisor tests
 *
 * Workers, classifiers and synthesizers with predictable output, so runs can
 * be traced step by step without a model.
 */

import { vi, type Mock } from 'vitest';
import type { IntentClassifier, Rasterizer, Synthesizer } from '../../src/collaborators/types';
import { DEFAULT_ADVISOR_CONFIG, type ResolvedAdvisorConfig } from '../../src/config';
import type { WorkerId } from '../../src/state';
import { structuredResult, textResult, type Worker, type WorkerOutput } from '../../src/workers';

export const TEST_CONFIG: ResolvedAdvisorConfig = {
  ...DEFAULT_ADVISOR_CONFIG,
  apiKey: 'test-secret',
  retryDelayMs: 0,
  logLevel: 'error',
};

export const RISK_OBSERVATION = {
  risk_level: 'Medium',
  risk_score: 62,
  positive_factors: ['Steady contributions'],
  risks_identified: ['Concentrated equity holdings'],
  summary: 'Moderate risk driven by equity concentration.',
};

export const FRAUD_OBSERVATION = {
  is_fraudulent: true,
  confidence_score: 0.87,
  rules_triggered: ['Transaction far above usual amount'],
  recommended_action: 'Freeze the card and contact the user.',
};

export const PENSION_OBSERVATION = {
  current_savings: '$45,000',
  projected_balance_at_retirement: '$310,000',
  years_remaining: 25,
  retirement_goal: '$400,000',
  progress_to_goal: '11.25%',
  status: 'Behind schedule',
};

const TOOL_FOR: Record<WorkerId, { toolName: string; observation: unknown }> = {
  risk: { toolName: 'analyze_risk_profile', observation: RISK_OBSERVATION },
  fraud: { toolName: 'detect_fraud', observation: FRAUD_OBSERVATION },
  projection: { toolName: 'project_pension', observation: PENSION_OBSERVATION },
};

/**
 * Worker that calls its one tool for the run's user and reports the JSON result
 */
type WorkerRun = Worker['run'];
type ClassifyFn = IntentClassifier['classify'];
type SynthesizeFn = Synthesizer['synthesize'];

export function createStructuredWorker(
  id: WorkerId,
  text = `${id} analysis complete`
): Worker & { run: Mock<WorkerRun> } {
  const { toolName, observation } = TOOL_FOR[id];
  return {
    id,
    run: vi.fn<WorkerRun>(async (_queryText, context) =>
      structuredResult(text, [
        { toolName, input: { user_id: context.userId }, observation: JSON.stringify(observation) },
      ])
    ),
  };
}

export function createTextWorker(id: WorkerId, text: string): Worker & { run: Mock<WorkerRun> } {
  return { id, run: vi.fn<WorkerRun>(async () => textResult(text)) };
}

export function createWorkerSet(): Worker[] {
  return [createStructuredWorker('risk'), createStructuredWorker('fraud'), createStructuredWorker('projection')];
}

/**
 * Worker that only settles when the run is aborted
 */
export function createHangingWorker(id: WorkerId): Worker {
  return {
    id,
    run: (_queryText, _context, signal) =>
      new Promise<WorkerOutput>((_resolve, reject) => {
        const abort = () => {
          const error = new Error('Worker aborted');
          error.name = 'AbortError';
          reject(error);
        };
        if (signal?.aborted) {
          abort();
        } else {
          signal?.addEventListener('abort', abort, { once: true });
        }
      }),
  };
}

export function fixedClassifier(route: string): IntentClassifier & { classify: Mock<ClassifyFn> } {
  return { classify: vi.fn<ClassifyFn>(async () => route) };
}

export function failingClassifier(message = 'classifier offline'): IntentClassifier {
  return {
    classify: vi.fn(async () => {
      throw new Error(message);
    }),
  };
}

/**
 * Synthesizer that names the run's user and lists the worker outputs it saw
 */
export function echoSynthesizer(): Synthesizer & { synthesize: Mock<SynthesizeFn> } {
  return {
    synthesize: vi.fn<SynthesizeFn>(async (messages, context) => {
      const sources = messages.filter((m) => m.role === 'worker').map((m) => m.source ?? 'unknown');
      return `Report for user ${context.userId ?? 'anonymous'} from ${sources.join(', ') || 'no workers'}`;
    }),
  };
}

export function fixedSynthesizer(text: string): Synthesizer {
  return { synthesize: vi.fn(async () => text) };
}

export function fixedRasterizer(bytes: Uint8Array | null): Rasterizer {
  return { rasterize: vi.fn(async () => bytes) };
}
