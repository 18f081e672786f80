/**
 * Advisor configuration tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  clearConfigCache,
  DEFAULT_ADVISOR_CONFIG,
  HARD_TURN_CAP,
  loadAdvisorConfig,
  loadEnvConfig,
  sanitizeConfig,
} from '../src/config';
import { ConfigError } from '../src/errors';

describe('advisor config', () => {
  beforeEach(() => {
    clearConfigCache();
    vi.stubEnv('ADVISOR_MAX_TURNS', '');
    vi.stubEnv('ADVISOR_MODEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCache();
  });

  it('should default to the hard turn cap and one retry', () => {
    expect(DEFAULT_ADVISOR_CONFIG.maxTurns).toBe(HARD_TURN_CAP);
    expect(HARD_TURN_CAP).toBe(5);
    expect(DEFAULT_ADVISOR_CONFIG.collaboratorRetries).toBe(1);
  });

  describe('sanitizeConfig', () => {
    it('should clamp and floor numeric values', () => {
      const config = sanitizeConfig({ temperature: 5, maxTurns: 3.7, retryDelayMs: -10, collaboratorRetries: 2.5 });
      expect(config.temperature).toBe(1);
      expect(config.maxTurns).toBe(3);
      expect(config.retryDelayMs).toBe(0);
      expect(config.collaboratorRetries).toBe(2);
    });

    it('should drop values of the wrong type or out of range', () => {
      const config = sanitizeConfig({ model: 42, previewLength: 0, logLevel: 'loud', maxTurns: 0 });
      expect(config.model).toBeUndefined();
      expect(config.previewLength).toBeUndefined();
      expect(config.logLevel).toBeUndefined();
      expect(config.maxTurns).toBeUndefined();
    });
  });

  describe('loadEnvConfig', () => {
    it('should read numbers and strings from the environment', () => {
      const config = loadEnvConfig({
        ADVISOR_MAX_TURNS: '3',
        ADVISOR_MODEL: 'claude-test',
        ADVISOR_LOG_LEVEL: 'warn',
        ADVISOR_RETRIES: '2',
        ADVISOR_TIMEOUT_MS: '1500',
      });
      expect(config).toMatchObject({
        maxTurns: 3,
        model: 'claude-test',
        logLevel: 'warn',
        collaboratorRetries: 2,
        runTimeoutMs: 1500,
      });
    });
  });

  describe('loadAdvisorConfig', () => {
    it('should clamp maxTurns to the hard cap', () => {
      expect(loadAdvisorConfig({ maxTurns: 9 }).maxTurns).toBe(HARD_TURN_CAP);
    });

    it('should reject a turn cap below one', () => {
      expect(() => loadAdvisorConfig({ maxTurns: 0 })).toThrow(ConfigError);
    });

    it('should let overrides win over environment values', () => {
      vi.stubEnv('ADVISOR_MAX_TURNS', '2');
      expect(loadAdvisorConfig().maxTurns).toBe(2);
      expect(loadAdvisorConfig({ maxTurns: 4 }).maxTurns).toBe(4);
    });

    it('should read a custom config file', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'advisor-config-'));
      const file = path.join(dir, 'advisor.config.json');
      fs.writeFileSync(file, JSON.stringify({ model: 'file-model', previewLength: 80 }));

      try {
        const config = loadAdvisorConfig(undefined, file);
        expect(config.model).toBe('file-model');
        expect(config.previewLength).toBe(80);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should cache the plain load until cleared', () => {
      const first = loadAdvisorConfig();
      expect(loadAdvisorConfig()).toBe(first);
      clearConfigCache();
      expect(loadAdvisorConfig()).not.toBe(first);
    });
  });
});
