import os from 'node:os';
import type { CrawlerConfig } from './types.js';

export const DEFAULT_CONFIG: CrawlerConfig = {
  workers: 0,
  delayMs: 1000,
  maxRetries: 3,
  retryBackoffMs: 5000,
  userAgent: 'frontier-crawler/1.0 (+https://example.com/bot)',
  timeoutMs: 15000,
  dequeueTimeoutMs: 1000,
  outputPath: 'data/scraped_data.jsonl',
  excerptLength: 500
};

// Network-bound work: favour more workers than cores.
export function determineAutoWorkers(cpus: number = os.cpus().length): number {
  return Math.max(2, Math.min(32, (cpus || 4) * 4));
}

export function withDefaults(cfg: Partial<CrawlerConfig> = {}): CrawlerConfig {
  return { ...DEFAULT_CONFIG, ...cfg };
}

function int(value: string | undefined, fallback: number): number {
  const n = parseInt(value || '', 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  return {
    workers: int(env.WORKERS, DEFAULT_CONFIG.workers),
    delayMs: int(env.DELAY_MS, DEFAULT_CONFIG.delayMs),
    maxRetries: int(env.MAX_RETRIES, DEFAULT_CONFIG.maxRetries),
    retryBackoffMs: int(env.RETRY_BACKOFF_MS, DEFAULT_CONFIG.retryBackoffMs),
    userAgent: env.USER_AGENT || DEFAULT_CONFIG.userAgent,
    timeoutMs: int(env.TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    dequeueTimeoutMs: int(env.DEQUEUE_TIMEOUT_MS, DEFAULT_CONFIG.dequeueTimeoutMs),
    outputPath: env.OUTPUT_PATH || DEFAULT_CONFIG.outputPath,
    excerptLength: int(env.EXCERPT_LENGTH, DEFAULT_CONFIG.excerptLength)
  };
}
