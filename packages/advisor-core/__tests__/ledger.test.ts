/**
 * Tool-result ledger tests
 */

import { describe, it, expect } from 'vitest';
import {
  createLedgerEntry,
  firstEntryForTool,
  hasToolResult,
  parseObservation,
  previewObservation,
} from '../src/ledger';

describe('ledger', () => {
  const first = createLedgerEntry('risk', {
    toolName: 'analyze_risk_profile',
    input: { user_id: '1' },
    observation: '{"risk_score":40}',
  });
  const second = createLedgerEntry('risk', {
    toolName: 'analyze_risk_profile',
    input: { user_id: '1' },
    observation: '{"risk_score":90}',
  });
  const fraud = createLedgerEntry('fraud', { toolName: 'detect_fraud', input: {}, observation: { is_fraudulent: false } });
  const ledger = [first, fraud, second];

  it('should attribute entries to the worker that ran the tool', () => {
    expect(first).toMatchObject({
      workerName: 'risk',
      toolName: 'analyze_risk_profile',
      input: { user_id: '1' },
      output: '{"risk_score":40}',
    });
  });

  it('should find the first entry for a tool', () => {
    expect(firstEntryForTool(ledger, 'analyze_risk_profile')).toBe(first);
    expect(firstEntryForTool(ledger, 'project_pension')).toBeUndefined();
    expect(hasToolResult(ledger, 'detect_fraud')).toBe(true);
    expect(hasToolResult(ledger, 'project_pension')).toBe(false);
  });

  it('should not count error observations or unparseable text as tool data', () => {
    const signedOut = createLedgerEntry('fraud', {
      toolName: 'detect_fraud',
      input: {},
      observation: '{"error":"No authenticated user"}',
    });
    const prose = createLedgerEntry('fraud', { toolName: 'detect_fraud', input: {}, observation: 'clean' });

    expect(hasToolResult([signedOut, prose], 'detect_fraud')).toBe(false);
    expect(hasToolResult([signedOut, fraud], 'detect_fraud')).toBe(true);
  });

  describe('previewObservation', () => {
    it('should bound long text and add an ellipsis', () => {
      expect(previewObservation('abcdef', 3)).toBe('abc...');
      expect(previewObservation('abc', 3)).toBe('abc');
    });

    it('should serialise structured observations', () => {
      expect(previewObservation({ risk_score: 40 })).toBe('{"risk_score":40}');
      expect(previewObservation(undefined)).toBe('undefined');
    });

    it('should keep the full payload in the entry while bounding the preview', () => {
      const long = 'x'.repeat(500);
      const entry = createLedgerEntry('projection', { toolName: 'project_pension', input: {}, observation: long });
      expect(entry.output).toBe(long);
      expect(previewObservation(entry.output, 200)).toHaveLength(203);
    });
  });

  describe('parseObservation', () => {
    it('should parse JSON object strings', () => {
      expect(parseObservation('{"risk_score":40}')).toEqual({ risk_score: 40 });
    });

    it('should pass records through', () => {
      const record = { is_fraudulent: false };
      expect(parseObservation(record)).toBe(record);
    });

    it('should reject text and non-object JSON', () => {
      expect(parseObservation('Risk looks fine')).toBeNull();
      expect(parseObservation('[1,2]')).toBeNull();
      expect(parseObservation(42)).toBeNull();
    });
  });
});
