/**
 * Financial Tools Tests
 *
 * Per-run tools over the fixture data source, tool-call execution and the
 * tool-calling specialist loop.
 */

import { describe, it, expect } from 'vitest';
import { AIMessage, ToolMessage } from '@langchain/core/messages';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { createRunContext } from '../src/context';
import {
  coerceUserId,
  createFinancialTools,
  createFixtureDataSource,
  createSpecialistWorker,
  executeToolCalls,
  parseFixtureData,
  parseKnowledgeQuery,
  resolveUserId,
  type FinancialDataSource,
} from '../src/workers';
import { PENSION_OBSERVATION, RISK_OBSERVATION } from './mocks/fake-collaborators';
import { ScriptedToolModel } from './mocks/scripted-tool-model';

const fixtures = parseFixtureData({
  profiles: {
    '1': { risk: RISK_OBSERVATION, projection: PENSION_OBSERVATION },
  },
  knowledge: [
    { keywords: ['contribution'], answer: 'Contributions are taken from gross salary each month.' },
    { keywords: ['tax relief'], answer: 'Tax relief is added at your marginal rate.' },
  ],
});

const dataSource = createFixtureDataSource(fixtures);

function toolsFor(userId?: number) {
  const tools: StructuredToolInterface[] = createFinancialTools(dataSource, createRunContext({ userId }));
  const byName = new Map(tools.map((t) => [t.name, t]));
  const get = (name: string) => {
    const found = byName.get(name);
    if (!found) throw new Error(`missing tool ${name}`);
    return found;
  };
  return { tools, get };
}

describe('user id helpers', () => {
  it('should coerce ids from numbers and text', () => {
    expect(coerceUserId(42)).toBe('42');
    expect(coerceUserId(4.7)).toBe('4');
    expect(coerceUserId('user 42')).toBe('42');
    expect(coerceUserId('abc')).toBeUndefined();
    expect(coerceUserId(undefined)).toBeUndefined();
  });

  it('should prefer the run context over a supplied id', () => {
    expect(resolveUserId(createRunContext({ userId: 1 }), 99)).toBe('1');
    expect(resolveUserId(createRunContext(), '7')).toBe('7');
  });

  it('should parse knowledge queries', () => {
    expect(parseKnowledgeQuery('What is a pension?')).toEqual({ query: 'What is a pension?' });
    expect(parseKnowledgeQuery('query="tax relief", user_id: 4')).toEqual({ query: 'tax relief', userId: '4' });
  });
});

describe('financial tools', () => {
  it('should expose the four tools', () => {
    expect(toolsFor(1).tools.map((t) => t.name)).toEqual([
      'analyze_risk_profile',
      'detect_fraud',
      'project_pension',
      'knowledge_base_search',
    ]);
  });

  it("should query the run's own user even when the model supplies another id", async () => {
    const result = await toolsFor(1).get('analyze_risk_profile').invoke({ user_id: 99 });
    expect(JSON.parse(String(result))).toEqual(RISK_OBSERVATION);
  });

  it('should accept a model-supplied id when the run has no user', async () => {
    const result = await toolsFor().get('project_pension').invoke({ user_id: 'user 1' });
    expect(JSON.parse(String(result))).toEqual(PENSION_OBSERVATION);
  });

  it('should refuse without any user', async () => {
    const result = await toolsFor().get('detect_fraud').invoke({});
    expect(result).toBe('{"error":"No authenticated user is available for this request."}');
  });

  it('should report users without data', async () => {
    const result = await toolsFor(2).get('detect_fraud').invoke({});
    expect(JSON.parse(String(result))).toEqual({ error: 'No pension data found for User ID: 2' });
  });

  it('should search the knowledge base', async () => {
    const { get } = toolsFor(1);
    await expect(get('knowledge_base_search').invoke({ input: 'user_id=1, query=How do contributions work?' })).resolves.toBe(
      'Contributions are taken from gross salary each month.'
    );
    await expect(get('knowledge_base_search').invoke({ input: 'Tell me a joke' })).resolves.toBe(
      'No relevant information found.'
    );
  });

  it('should reject malformed fixture data', () => {
    expect(() => parseFixtureData({ profiles: { '1': { risk: { risk_level: 'High' } } } })).toThrow();
  });
});

describe('executeToolCalls', () => {
  it('should run calls in order and report unknown tools', async () => {
    const { tools } = toolsFor(1);

    const steps = await executeToolCalls(
      [
        { name: 'analyze_risk_profile', args: {}, id: 'call_1', type: 'tool_call' },
        { name: 'unknown_tool', args: { x: 1 } },
      ],
      tools
    );

    expect(steps).toHaveLength(2);
    expect(steps[0]).toMatchObject({ toolName: 'analyze_risk_profile', input: {}, callId: 'call_1' });
    expect(JSON.parse(String(steps[0].observation))).toEqual(RISK_OBSERVATION);
    expect(steps[1]).toEqual({
      toolName: 'unknown_tool',
      input: { x: 1 },
      observation: '{"error":"Unknown tool: unknown_tool"}',
      callId: 'unknown_tool_1',
    });
  });

  it('should turn tool failures into error observations', async () => {
    const failing: FinancialDataSource = {
      ...dataSource,
      analyzeRiskProfile: async () => {
        throw new Error('risk service offline');
      },
    };
    const tools = createFinancialTools(failing, createRunContext({ userId: 1 }));

    const [step] = await executeToolCalls([{ name: 'analyze_risk_profile', args: {}, id: 'c1' }], tools);

    expect(step.observation).toBe('{"error":"risk service offline"}');
  });
});

describe('tool-calling specialist', () => {
  it('should loop through tool calls until the model answers', async () => {
    const model = new ScriptedToolModel([
      new AIMessage({
        content: '',
        tool_calls: [{ name: 'analyze_risk_profile', args: { user_id: 99 }, id: 'call_1', type: 'tool_call' }],
      }),
      new AIMessage('Your risk is medium.'),
    ]);
    const worker = createSpecialistWorker('risk', { model, dataSource });

    const output = await worker.run('How risky am I?', createRunContext({ userId: 1 }));

    expect(model.boundToolNames).toEqual(['analyze_risk_profile', 'knowledge_base_search']);
    expect(output.kind).toBe('structured');
    expect(output.text).toBe('Your risk is medium.');
    if (output.kind !== 'structured') return;
    expect(output.toolTrace).toHaveLength(1);
    expect(output.toolTrace[0].toolName).toBe('analyze_risk_profile');
    expect(JSON.parse(String(output.toolTrace[0].observation))).toEqual(RISK_OBSERVATION);

    const secondTurn = model.received[1];
    const toolMessage = secondTurn[secondTurn.length - 1];
    expect(toolMessage).toBeInstanceOf(ToolMessage);
    if (toolMessage instanceof ToolMessage) {
      expect(toolMessage.tool_call_id).toBe('call_1');
    }
  });

  it('should tell the model whose data it may use', async () => {
    const model = new ScriptedToolModel([new AIMessage('Done.')]);
    const worker = createSpecialistWorker('projection', { model, dataSource });

    await worker.run('How is my pension?', createRunContext({ userId: 1 }));

    expect(String(model.received[0][0].content)).toContain(
      'The authenticated user for this request has user_id 1. Use it for every tool call.'
    );
  });

  it('should stop at the step limit', async () => {
    const model = new ScriptedToolModel([
      new AIMessage({
        content: '',
        tool_calls: [{ name: 'detect_fraud', args: {}, id: 'again', type: 'tool_call' }],
      }),
    ]);
    const worker = createSpecialistWorker('fraud', { model, dataSource, maxSteps: 2 });

    const output = await worker.run('Any fraud?', createRunContext({ userId: 1 }));

    expect(model.received).toHaveLength(2);
    expect(output.kind === 'structured' ? output.toolTrace.length : 0).toBe(2);
  });
});
