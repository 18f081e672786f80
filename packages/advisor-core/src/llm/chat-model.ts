/**
 * Chat model factory
 */

import { ChatAnthropic } from '@langchain/anthropic';
import type { ResolvedAdvisorConfig } from '../config';
import { createAgentLogger } from '../tracing';

const log = createAgentLogger('ChatModel');

/**
 * Anthropic chat model configured from the advisor config
 */
export function createChatModel(config: ResolvedAdvisorConfig): ChatAnthropic {
    if (!config.apiKey) {
        log.warn('No API key configured; model calls will fail until ANTHROPIC_API_KEY is set');
    }

    return new ChatAnthropic({
        anthropicApiKey: config.apiKey,
        model: config.model,
        temperature: config.temperature,
        maxRetries: config.maxRetries,
        ...(config.maxTokens !== undefined ? { maxTokens: config.maxTokens } : {}),
        ...(config.baseUrl ? { anthropicApiUrl: config.baseUrl } : {}),
        clientOptions: { timeout: config.timeout },
    });
}
