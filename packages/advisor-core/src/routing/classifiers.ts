/**
 * Intent Classifiers
 *
 * Fresh-query routing collaborators: a keyword heuristic that needs no model,
 * and a chat-model supervisor prompt.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { IntentClassifier } from '../collaborators/types';
import { contentToText } from '../messages';
import { isRecord } from '../shared/guards';
import { createAgentLogger } from '../tracing';
import {
    coerceRoute,
    DEFAULT_CLASSIFIER_RULES,
    type ClassifiedRoute,
    type ClassifierRule,
} from './intent-table';

const log = createAgentLogger('Classifier');

// ============================================================
// Heuristic
// ============================================================

/**
 * Score each route by its rules' weights; a rule counts once however many of
 * its keywords match. No match routes to consolidation.
 */
export function classifyByKeywords(
    text: string,
    rules: readonly ClassifierRule[] = DEFAULT_CLASSIFIER_RULES
): ClassifiedRoute {
    const lowered = text.toLowerCase();
    const scores = new Map<ClassifiedRoute, number>();

    for (const rule of rules) {
        if (rule.keywords.some((keyword) => lowered.includes(keyword.toLowerCase()))) {
            scores.set(rule.route, (scores.get(rule.route) ?? 0) + rule.weight);
        }
    }

    let best: ClassifiedRoute = 'consolidate';
    let bestScore = 0;
    for (const [route, score] of scores) {
        if (score > bestScore) {
            best = route;
            bestScore = score;
        }
    }
    return best;
}

export function createHeuristicClassifier(
    rules: readonly ClassifierRule[] = DEFAULT_CLASSIFIER_RULES
): IntentClassifier {
    return {
        classify: async (conversationText) => classifyByKeywords(conversationText, rules),
    };
}

// ============================================================
// LLM
// ============================================================

export const SUPERVISOR_PROMPT = `You are the supervisor of a team of financial specialists. Route the user's request to exactly one of them.

Available routes:
- "risk": financial risk, volatility and portfolio diversity
- "fraud": suspicious transactions and fraud checks
- "projection": pension growth, retirement savings and projections
- "consolidate": general questions that need no specialist data
- "finish": only when the user is saying goodbye or the conversation is over

Respond with a single JSON object and nothing else:
{"next": "<route>"}`;

/**
 * Read a route word from a model reply: a `{"next": ...}` object anywhere in
 * the text, otherwise the first known route word. Empty string when neither.
 */
export function parseRouteResponse(text: string): string {
    const jsonMatch = text.match(/\{[\s\S]*?\}/);
    if (jsonMatch) {
        try {
            const parsed: unknown = JSON.parse(jsonMatch[0]);
            if (isRecord(parsed) && typeof parsed.next === 'string') {
                return parsed.next.trim();
            }
        } catch (error) {
            log.debug('Route reply is not valid JSON, scanning words', { error: String(error) });
        }
    }

    for (const word of text.split(/[^A-Za-z_]+/)) {
        if (coerceRoute(word) !== null) {
            return word;
        }
    }
    return '';
}

export interface LLMClassifierOptions {
    systemPrompt?: string;
}

export function createLLMClassifier(model: BaseChatModel, options: LLMClassifierOptions = {}): IntentClassifier {
    const systemPrompt = options.systemPrompt ?? SUPERVISOR_PROMPT;

    return {
        async classify(conversationText) {
            const response = await model.invoke([
                new SystemMessage(systemPrompt),
                new HumanMessage(`Conversation so far:\n${conversationText}`),
            ]);
            const route = parseRouteResponse(contentToText(response.content));
            log.debug('Classifier replied', { route });
            return route;
        },
    };
}
