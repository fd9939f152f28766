import { determineAutoWorkers, withDefaults } from './config.js';
import { errorMessage } from './errors.js';
import type { FrontierStore } from './frontier.js';
import type { Fetcher } from './http.js';
import { WorkQueue } from './queue.js';
import { looksLikeSitemapUrl } from './sitemap.js';
import type { ContentSink } from './storage.js';
import type { CrawlerConfig, CrawlerStatus, CrawlStats, SetStatusResult } from './types.js';
import { matchesDomain, normalizeUrl, prefixOf, hostOf, topCounts } from './utils.js';
import { runWorker, type WorkerContext } from './worker.js';

export type SeedResult =
  | { result: 'seeded'; url: string }
  | { result: 'skipped'; url: string }
  | { result: 'invalid'; input: string };

export type PrefixPauseResult = {
  paused: number;
  removedFromQueue: number;
};

/**
 * Owns the work queue, the worker tasks and the shutdown signal, and exposes
 * the operator commands. All commands are safe to call while workers run.
 */
export class Crawler {
  readonly queue = new WorkQueue();
  readonly cfg: CrawlerConfig;
  private abort = new AbortController();
  private workers: Promise<void>[] = [];
  private started = false;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly store: FrontierStore,
    private readonly fetcher: Fetcher,
    private readonly sink: ContentSink,
    cfg: Partial<CrawlerConfig> = {}
  ) {
    this.cfg = withDefaults(cfg);
  }

  /** Startup: recover crashed leases, then reload every pending row into the queue. */
  async init(): Promise<number> {
    const recovered = await this.store.recoverInProgress();
    if (recovered) console.log(`[crawler] recovered ${recovered} in-progress URL(s) from previous run`);
    const pending = await this.store.listByStatus('pending');
    for (const r of pending) this.queue.push(r.url);
    console.log(`[crawler] loaded ${pending.length} pending URL(s)`);
    return pending.length;
  }

  start(workers: number = this.cfg.workers): number {
    if (this.started) throw new Error('crawler already started');
    if (this.stopping) throw new Error('crawler is stopped');
    this.started = true;

    const n = workers > 0 ? workers : determineAutoWorkers();
    const ctx: WorkerContext = {
      store: this.store,
      queue: this.queue,
      fetcher: this.fetcher,
      sink: this.sink,
      config: this.cfg,
      signal: this.abort.signal
    };
    for (let i = 0; i < n; i++) {
      const name = `worker-${i + 1}`;
      this.workers.push(
        runWorker(ctx, name).catch((err) => {
          console.error(`[${name}] crashed: ${errorMessage(err)}`);
        })
      );
    }
    console.log(`[crawler] started ${n} worker(s), delay=${this.cfg.delayMs}ms`);
    return n;
  }

  /** Workers finish their current URL, then the store is closed. Safe to call twice. */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    console.log('[crawler] stopping (workers finish current tasks)');
    this.abort.abort();
    await Promise.all(this.workers);
    this.queue.close();
    await this.store.close();
    console.log('[crawler] state saved');
  }

  isRunning(): boolean {
    return this.started && !this.stopping;
  }

  async seed(input: string): Promise<SeedResult> {
    const url = normalizeUrl(input);
    if (!url) return { result: 'invalid', input };
    const inserted = await this.store.upsertNew(url, looksLikeSitemapUrl(url));
    if (!inserted) {
      console.log(`[crawler] seed skipped (exists): ${url}`);
      return { result: 'skipped', url };
    }
    this.queue.push(url);
    console.log(`[crawler] seeded: ${url}`);
    return { result: 'seeded', url };
  }

  async pause(input: string, reason = 'user-pause'): Promise<SetStatusResult> {
    const url = normalizeUrl(input);
    if (!url) return { ok: false, reason: 'not_found' };
    const res = await this.store.setStatus(url, 'paused', reason);
    if (res.ok) {
      this.queue.remove(url);
      console.log(`[crawler] paused: ${url} reason=${reason}`);
    }
    return res;
  }

  /** paused -> pending, or an operator override of error -> pending. */
  async resume(input: string): Promise<SetStatusResult> {
    const url = normalizeUrl(input);
    if (!url) return { ok: false, reason: 'not_found' };
    const res = await this.store.setStatus(url, 'pending');
    if (res.ok) {
      this.queue.push(url);
      console.log(`[crawler] resumed: ${url}`);
    }
    return res;
  }

  async pausePrefix(prefix: string, reason = 'user-pause-prefix'): Promise<PrefixPauseResult> {
    const paused = await this.store.pauseByPrefix(prefix, reason);
    // the worker's claim is the real guard; this only saves wasted dequeues
    const removedFromQueue = this.queue.removeByPrefix(prefix);
    console.log(`[crawler] paused ${paused.length} URL(s) with prefix ${prefix} (removed ${removedFromQueue} from queue)`);
    return { paused: paused.length, removedFromQueue };
  }

  async resumePrefix(prefix: string): Promise<number> {
    const urls = await this.store.resumeByPrefix(prefix);
    for (const u of urls) this.queue.push(u);
    console.log(`[crawler] resumed ${urls.length} URL(s) with prefix ${prefix}`);
    return urls.length;
  }

  async resumeAllPaused(): Promise<number> {
    const urls = await this.store.resumeAllPaused();
    for (const u of urls) this.queue.push(u);
    if (urls.length) console.log(`[crawler] resumed all paused: ${urls.length} URL(s)`);
    return urls.length;
  }

  /** Resumes paused URLs on `domain` or any of its subdomains. */
  async resumeDomain(domain: string): Promise<number> {
    const paused = await this.store.listByStatus('paused');
    let resumed = 0;
    for (const r of paused) {
      if (!matchesDomain(r.url, domain)) continue;
      const res = await this.store.setStatus(r.url, 'pending');
      if (!res.ok) continue;
      this.queue.push(r.url);
      resumed++;
    }
    if (resumed) console.log(`[crawler] resumed ${resumed} paused URL(s) for domain ${domain}`);
    return resumed;
  }

  async listPending(prefix: string): Promise<string[]> {
    const rows = await this.store.listByPrefix(prefix, 'pending');
    return rows.map((r) => r.url);
  }

  async listPaused(domain?: string): Promise<string[]> {
    const rows = await this.store.listByStatus('paused');
    const urls = rows.map((r) => r.url);
    return domain ? urls.filter((u) => matchesDomain(u, domain)) : urls;
  }

  /** Host of the first URL ever registered, taken as the crawl's main domain. */
  async mainDomain(): Promise<string | null> {
    const first = await this.store.earliestUrl();
    return first ? hostOf(first) : null;
  }

  async status(): Promise<CrawlerStatus> {
    return {
      workers: this.workers.length,
      running: this.isRunning(),
      queued: this.queue.size(),
      counts: await this.store.countsByStatus()
    };
  }

  async stats(topN = 10): Promise<CrawlStats> {
    const counts = await this.store.countsByStatus();
    const total = Object.values(counts).reduce((a, b) => a + b, 0);
    const paused = await this.listPaused();
    return {
      totals: { ...counts, total },
      earliestSeed: await this.store.earliestUrl(),
      topPausedDomains: topCounts(paused.map(hostOf), topN),
      topPausedPrefixes: topCounts(paused.map(prefixOf), topN),
      domainDistribution: await this.store.countsByDomain(topN)
    };
  }
}
