/**
 * Tool-Calling Worker
 *
 * A specialist backed by a chat model with bound tools. Loops model → tool
 * calls → tool results until the model answers without calling a tool.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
    HumanMessage,
    SystemMessage,
    ToolMessage,
    type BaseMessage,
} from '@langchain/core/messages';
import type { ToolCall } from '@langchain/core/messages/tool';
import type { StructuredToolInterface } from '@langchain/core/tools';
import type { RunContext } from '../context';
import type { ToolTraceStep } from '../ledger';
import { contentToText } from '../messages';
import { errorMessage } from '../shared/guards';
import type { WorkerId } from '../state';
import { createAgentLogger } from '../tracing';
import { structuredResult, type Worker, type WorkerOutput } from './types';

const log = createAgentLogger('ToolCallingWorker');

// ============================================================
// Types
// ============================================================

export interface ToolCallingWorkerConfig {
    id: WorkerId;
    model: BaseChatModel;
    /** Tools for one run, built from that run's context */
    tools: (context: RunContext) => StructuredToolInterface[];
    systemPrompt: string;
    description?: string;
    /** Model turns before giving up on a final answer */
    maxSteps?: number;
}

// ============================================================
// Helpers
// ============================================================

function contextPrompt(context: RunContext): string {
    return context.userId
        ? `The authenticated user for this request has user_id ${context.userId}. Use it for every tool call.`
        : 'No authenticated user is available. Ask the user to sign in if their data is needed.';
}

/**
 * Execute the tool calls of one model turn, in order.
 * Unknown tools and tool failures become error observations.
 */
export async function executeToolCalls(
    toolCalls: readonly ToolCall[],
    tools: readonly StructuredToolInterface[]
): Promise<Array<ToolTraceStep & { callId: string }>> {
    const byName = new Map(tools.map((t) => [t.name, t]));
    const steps: Array<ToolTraceStep & { callId: string }> = [];

    for (const [index, call] of toolCalls.entries()) {
        const callId = call.id ?? `${call.name}_${index}`;
        const target = byName.get(call.name);
        let observation: unknown;

        if (!target) {
            observation = JSON.stringify({ error: `Unknown tool: ${call.name}` });
        } else {
            try {
                observation = await target.invoke(call.args);
            } catch (error) {
                log.warn('Tool call failed', { tool: call.name, error: errorMessage(error) });
                observation = JSON.stringify({ error: errorMessage(error) });
            }
        }

        steps.push({ toolName: call.name, input: call.args, observation, callId });
    }

    return steps;
}

// ============================================================
// Factory
// ============================================================

export function createToolCallingWorker(config: ToolCallingWorkerConfig): Worker {
    const { id, model, systemPrompt, description, maxSteps = 4 } = config;

    return {
        id,
        description,
        async run(queryText: string, context: RunContext, signal?: AbortSignal): Promise<WorkerOutput> {
            const tools = config.tools(context);
            if (!model.bindTools) {
                throw new Error(`Model for ${id} worker does not support tool calling`);
            }
            const bound = model.bindTools(tools);

            const messages: BaseMessage[] = [
                new SystemMessage(`${systemPrompt}\n\n${contextPrompt(context)}`),
                new HumanMessage(queryText),
            ];
            const toolTrace: ToolTraceStep[] = [];
            let lastText = '';

            for (let step = 0; step < maxSteps; step++) {
                const response = await bound.invoke(messages, { signal });
                messages.push(response);
                lastText = contentToText(response.content);

                const toolCalls = response.tool_calls ?? [];
                if (toolCalls.length === 0) {
                    return structuredResult(lastText, toolTrace);
                }

                const executed = await executeToolCalls(toolCalls, tools);
                for (const { callId, ...traceStep } of executed) {
                    toolTrace.push(traceStep);
                    messages.push(
                        new ToolMessage({
                            content:
                                typeof traceStep.observation === 'string'
                                    ? traceStep.observation
                                    : JSON.stringify(traceStep.observation) ?? '',
                            tool_call_id: callId,
                            name: traceStep.toolName,
                        })
                    );
                }
            }

            log.warn('Tool-calling worker hit its step limit', { id, maxSteps, toolCalls: toolTrace.length });
            return structuredResult(lastText, toolTrace);
        },
    };
}
