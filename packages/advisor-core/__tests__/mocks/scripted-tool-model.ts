/**
 * Scripted chat model for tool-calling tests
 *
 * Replays a fixed list of AI messages (with or without tool calls) and
 * records what it was sent.
 */

import {
  BaseChatModel,
  type BaseChatModelParams,
  type BindToolsInput,
} from '@langchain/core/language_models/chat_models';
import type { AIMessage, BaseMessage } from '@langchain/core/messages';
import type { ChatResult } from '@langchain/core/outputs';

export class ScriptedToolModel extends BaseChatModel {
  readonly received: BaseMessage[][] = [];
  boundToolNames: string[] = [];
  private index = 0;

  constructor(
    private readonly script: AIMessage[],
    params: BaseChatModelParams = {}
  ) {
    super(params);
  }

  _llmType(): string {
    return 'scripted-tool-model';
  }

  bindTools(tools: BindToolsInput[]) {
    this.boundToolNames = tools.map((t) => ('name' in t && typeof t.name === 'string' ? t.name : ''));
    return this;
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    this.received.push([...messages]);
    const message = this.script[Math.min(this.index, this.script.length - 1)];
    this.index += 1;
    return {
      generations: [{ text: typeof message.content === 'string' ? message.content : '', message }],
    };
  }
}
