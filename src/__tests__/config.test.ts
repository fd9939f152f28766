import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, determineAutoWorkers, loadConfig, withDefaults } from '../config.js';

describe('determineAutoWorkers', () => {
  it('uses four workers per core within [2, 32]', () => {
    expect(determineAutoWorkers(1)).toBe(4);
    expect(determineAutoWorkers(2)).toBe(8);
    expect(determineAutoWorkers(16)).toBe(32);
  });

  it('assumes four cores when the count is unknown', () => {
    expect(determineAutoWorkers(0)).toBe(16);
  });
});

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads numeric and string settings', () => {
    const cfg = loadConfig({
      WORKERS: '6',
      DELAY_MS: '250',
      MAX_RETRIES: '0',
      USER_AGENT: 'test-agent',
      OUTPUT_PATH: 'out/pages.jsonl'
    });
    expect(cfg).toMatchObject({
      workers: 6,
      delayMs: 250,
      maxRetries: 0,
      userAgent: 'test-agent',
      outputPath: 'out/pages.jsonl',
      retryBackoffMs: 5000
    });
  });

  it('ignores malformed and negative numbers', () => {
    const cfg = loadConfig({ WORKERS: 'lots', DELAY_MS: '-5', TIMEOUT_MS: '' });
    expect(cfg.workers).toBe(0);
    expect(cfg.delayMs).toBe(1000);
    expect(cfg.timeoutMs).toBe(15000);
  });
});

describe('withDefaults', () => {
  it('overrides only the given keys', () => {
    const cfg = withDefaults({ delayMs: 0 });
    expect(cfg.delayMs).toBe(0);
    expect(cfg.maxRetries).toBe(3);
    expect(cfg.excerptLength).toBe(500);
  });
});
