/**
 * Conversation State Tests
 *
 * Reducers, delta folding and terminal-state behaviour.
 */

import { describe, it, expect } from 'vitest';
import {
  appendReducer,
  applyStateDelta,
  createInitialState,
  finalResultReducer,
  hasChartPayload,
  isStepName,
  isWorkerId,
  mergeReducer,
  turnReducer,
  type FinalResult,
} from '../src/state';
import { createRunContext } from '../src/context';
import { workerMessage } from '../src/messages';
import { createLedgerEntry } from '../src/ledger';

function finalResult(summaryText: string): FinalResult {
  return {
    summaryText,
    charts: {},
    images: {},
    figures: {},
    indicators: {},
    metadata: { turnCount: 2, stepsVisited: ['consolidate'], ledgerSize: 0, guardrail: [], partial: false },
  };
}

describe('Conversation state', () => {
  // ============================================
  // Reducers
  // ============================================

  describe('reducers', () => {
    it('should append arrays in order', () => {
      expect(appendReducer([1, 2], [3])).toEqual([1, 2, 3]);
      expect(appendReducer(undefined, [1])).toEqual([1]);
      expect(appendReducer([1], undefined)).toEqual([1]);
      expect(appendReducer<number>(undefined, undefined)).toEqual([]);
    });

    it('should merge maps with last write winning per key', () => {
      expect(mergeReducer({ risk: 1, fraud: 2 }, { risk: 3 })).toEqual({ risk: 3, fraud: 2 });
      expect(mergeReducer(undefined, { projection: 1 })).toEqual({ projection: 1 });
    });

    it('should never move the turn counter backward', () => {
      expect(turnReducer(3, 2)).toBe(3);
      expect(turnReducer(3, 4)).toBe(4);
      expect(turnReducer(undefined, undefined)).toBe(0);
    });

    it('should keep the first final result', () => {
      const first = finalResult('first');
      expect(finalResultReducer(first, finalResult('second'))).toBe(first);
      expect(finalResultReducer(undefined, first)).toBe(first);
    });
  });

  // ============================================
  // Step names
  // ============================================

  describe('step names', () => {
    it('should recognise the closed step enumeration', () => {
      expect(isStepName('visualize')).toBe(true);
      expect(isStepName('finish')).toBe(true);
      expect(isStepName('supervisor')).toBe(false);
      expect(isStepName(undefined)).toBe(false);
    });

    it('should recognise only worker steps as workers', () => {
      expect(isWorkerId('risk')).toBe(true);
      expect(isWorkerId('projection')).toBe(true);
      expect(isWorkerId('consolidate')).toBe(false);
    });
  });

  // ============================================
  // Helpers
  // ============================================

  describe('createInitialState', () => {
    it('should seed the run with one user message and empty collections', () => {
      const context = createRunContext({ userId: 7, requestId: 'req_test' });
      const state = createInitialState('What is my risk?', context);

      expect(state.messages).toHaveLength(1);
      expect(state.messages[0].role).toBe('user');
      expect(state.messages[0].content).toBe('What is my risk?');
      expect(state.turnCount).toBe(0);
      expect(state.ledger).toEqual([]);
      expect(state.charts).toEqual({});
      expect(state.finalResult).toBeUndefined();
      expect(state.runContext).toEqual({ userId: '7', requestId: 'req_test', metadata: {} });
    });
  });

  describe('applyStateDelta', () => {
    it('should fold a delta with the graph reducers', () => {
      const state = createInitialState('q', createRunContext());
      const entry = createLedgerEntry('risk', { toolName: 'analyze_risk_profile', input: {}, observation: '{}' });

      const next = applyStateDelta(state, {
        messages: [workerMessage('risk', 'done')],
        ledger: [entry],
        next: 'risk',
        turnCount: 1,
        stepsVisited: ['risk'],
      });

      expect(next.messages.map((m) => m.content)).toEqual(['q', 'done']);
      expect(next.ledger).toEqual([entry]);
      expect(next.next).toBe('risk');
      expect(next.turnCount).toBe(1);
      expect(next.stepsVisited).toEqual(['risk']);
      expect(next.runContext).toBe(state.runContext);
    });

    it('should leave a terminal state unchanged', () => {
      const state = { ...createInitialState('q', createRunContext()), finalResult: finalResult('done') };

      const next = applyStateDelta(state, {
        messages: [workerMessage('risk', 'late output')],
        turnCount: 9,
        finalResult: finalResult('replacement'),
      });

      expect(next).toBe(state);
      expect(next.finalResult?.summaryText).toBe('done');
    });
  });

  describe('hasChartPayload', () => {
    it('should report any chart, image or figure', () => {
      expect(hasChartPayload({ charts: {}, images: {}, figures: {} })).toBe(false);
      expect(hasChartPayload({ charts: {}, images: { risk: 'data:image/png;base64,AA==' }, figures: {} })).toBe(true);
    });
  });
});
