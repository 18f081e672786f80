/**
 * Narrative Synthesizer
 *
 * Turns the run's message history into the user-facing answer.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { Synthesizer } from '../collaborators/types';
import { contentToText, renderTranscript, type ConversationMessage } from '../messages';
import { createAgentLogger } from '../tracing';

const log = createAgentLogger('Synthesizer');

export const NO_DATA_NOTICE =
  'I could not find any financial data for your request. Please check that you are signed in and try asking about your pension, risk profile or recent transactions.';

const SYNTHESIZER_SYSTEM_PROMPT = `You are an expert financial advisor. Take the data and analysis gathered by the specialists and write one cohesive, easy-to-understand answer for the user.

- Use the tool results in the conversation; do not invent figures.
- Do not mention the specialists or the routing.
- Speak directly to the user in a clear, friendly tone.
- Do not give instructions to buy or sell specific investments.`;

/**
 * Summary used when synthesis is unavailable: the latest real worker output
 */
export function fallbackSummary(messages: readonly ConversationMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.role === 'worker' && !message.diagnostic && message.content.trim()) {
      return message.content;
    }
  }
  return NO_DATA_NOTICE;
}

export interface LLMSynthesizerOptions {
  systemPrompt?: string;
}

export function createLLMSynthesizer(model: BaseChatModel, options: LLMSynthesizerOptions = {}): Synthesizer {
  const systemPrompt = options.systemPrompt ?? SYNTHESIZER_SYSTEM_PROMPT;

  return {
    async synthesize(messages) {
      const response = await model.invoke([
        new SystemMessage(systemPrompt),
        new HumanMessage(
          `Here is the conversation history:\n${renderTranscript(messages)}\n\nPlease provide the final answer based on these results.`
        ),
      ]);

      const text = contentToText(response.content);

      log.debug('Synthesized narrative', { length: text.length });
      return text;
    },
  };
}
