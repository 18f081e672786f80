/**
 * Specialist Workers
 *
 * The risk, fraud and projection workers: each is a tool-calling worker
 * restricted to its own tool plus knowledge search.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { WORKER_IDS, type WorkerId } from '../state';
import {
    createFinancialTools,
    FINANCIAL_TOOL_NAMES,
    type FinancialDataSource,
} from './financial-tools';
import { createToolCallingWorker } from './tool-calling-worker';
import type { Worker } from './types';

// ============================================================
// Prompts
// ============================================================

const SHARED_RULES = `Rules:
- Never invent or assume a user_id. Use only the one given for this request.
- If no user is available, say that the user needs to sign in.
- Report the numbers the tools return; do not make up figures.`;

export const SPECIALIST_PROMPTS: Record<WorkerId, string> = {
    risk: `You are a Risk Assessment Specialist. Analyze the user's financial risk profile with the ${FINANCIAL_TOOL_NAMES.risk} tool and explain the risk level, risk score, risk factors and positive factors.

Use ${FINANCIAL_TOOL_NAMES.knowledge} only for general questions about risk.

${SHARED_RULES}`,

    fraud: `You are a Fraud Detection Specialist. When the user asks for a fraud check or about suspicious activity, call the ${FINANCIAL_TOOL_NAMES.fraud} tool and report whether activity looks fraudulent, the confidence score, the rules triggered and the recommended action.

For related questions such as how to report a transaction, use ${FINANCIAL_TOOL_NAMES.knowledge}.

${SHARED_RULES}`,

    projection: `You are a Pension Analysis Specialist. Use the ${FINANCIAL_TOOL_NAMES.projection} tool to describe current savings against the retirement goal, progress and status, years remaining, savings rate and the projected balance at retirement.

Use ${FINANCIAL_TOOL_NAMES.knowledge} for general pension questions.

${SHARED_RULES}`,
};

const PRIMARY_TOOL: Record<WorkerId, string> = {
    risk: FINANCIAL_TOOL_NAMES.risk,
    fraud: FINANCIAL_TOOL_NAMES.fraud,
    projection: FINANCIAL_TOOL_NAMES.projection,
};

const DESCRIPTIONS: Record<WorkerId, string> = {
    risk: 'Risk profile assessment',
    fraud: 'Transaction fraud screening',
    projection: 'Pension projection and retirement planning',
};

export interface SpecialistWorkerOptions {
    model: BaseChatModel;
    dataSource: FinancialDataSource;
    maxSteps?: number;
}

export function createSpecialistWorker(id: WorkerId, options: SpecialistWorkerOptions): Worker {
    const allowed = new Set<string>([PRIMARY_TOOL[id], FINANCIAL_TOOL_NAMES.knowledge]);

    return createToolCallingWorker({
        id,
        model: options.model,
        systemPrompt: SPECIALIST_PROMPTS[id],
        description: DESCRIPTIONS[id],
        maxSteps: options.maxSteps,
        tools: (context) =>
            createFinancialTools(options.dataSource, context).filter((t) => allowed.has(t.name)),
    });
}

/**
 * One worker per specialist id
 */
export function createSpecialistWorkers(options: SpecialistWorkerOptions): Worker[] {
    return WORKER_IDS.map((id) => createSpecialistWorker(id, options));
}
