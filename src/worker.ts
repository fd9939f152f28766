import { CrawlError, errorMessage } from './errors.js';
import type { FrontierStore } from './frontier.js';
import type { Fetcher } from './http.js';
import type { WorkQueue } from './queue.js';
import { scrapePage, extractLinks } from './scrape_page.js';
import { expandSitemap, isSitemapResponse } from './sitemap.js';
import type { ContentSink } from './storage.js';
import { retryDelayMs } from './transitions.js';
import type { CrawlerConfig, SitemapEntry, UrlRecord } from './types.js';
import { sleep } from './utils.js';

export type WorkerContext = {
  store: FrontierStore;
  queue: WorkQueue;
  fetcher: Fetcher;
  sink: ContentSink;
  config: Pick<CrawlerConfig, 'delayMs' | 'dequeueTimeoutMs' | 'retryBackoffMs' | 'excerptLength'>;
  signal: AbortSignal;
};

export type ProcessOutcome = 'skipped' | 'released' | 'visited' | 'retry' | 'error';

type Handled = {
  isSitemap: boolean;
  discovered: SitemapEntry[];
};

/** Runs until the shutdown signal aborts. No per-URL failure ends the loop. */
export async function runWorker(ctx: WorkerContext, name: string): Promise<void> {
  console.log(`[${name}] started`);
  while (!ctx.signal.aborted) {
    const url = await ctx.queue.take(ctx.config.dequeueTimeoutMs, ctx.signal);
    if (url === null) continue;
    try {
      await processUrl(ctx, name, url);
    } catch (err) {
      console.error(`[${name}] unexpected error for ${url}: ${errorMessage(err)}`);
    }
  }
  console.log(`[${name}] stopped`);
}

/**
 * One iteration for a dequeued URL. The claim is the authoritative status
 * re-check: anything no longer pending (paused, taken by another worker,
 * already visited) is dropped silently.
 */
export async function processUrl(ctx: WorkerContext, name: string, url: string): Promise<ProcessOutcome> {
  const record = await ctx.store.claim(url);
  if (!record) return 'skipped';

  if (ctx.config.delayMs > 0) await sleep(ctx.config.delayMs, ctx.signal);
  if (ctx.signal.aborted) {
    await ctx.store.release(url);
    return 'released';
  }

  try {
    const handled = await fetchAndHandle(ctx, name, record);
    let added = 0;
    for (const entry of handled.discovered) {
      if (await ctx.store.upsertNew(entry.url, entry.isSitemap)) {
        ctx.queue.push(entry.url);
        added++;
      }
    }
    await ctx.store.markVisited(url, handled.isSitemap);
    console.log(`[${name}] visited: ${url} (+${added} new)`);
    return 'visited';
  } catch (err) {
    let fault = err;
    if (err instanceof CrawlError) {
      try {
        return await recordFailure(ctx, name, url, err);
      } catch (storeErr) {
        fault = storeErr;
      }
    }
    await releaseAfterFault(ctx, name, url);
    throw fault;
  }
}

async function fetchAndHandle(ctx: WorkerContext, name: string, record: UrlRecord): Promise<Handled> {
  console.log(`[${name}] fetching: ${record.url}`);
  const res = await ctx.fetcher.fetch(record.url);

  if (isSitemapResponse(record.url, res.contentType, res.body, record.isSitemap)) {
    const discovered = expandSitemap(res.body, res.contentType, record.url);
    console.log(`[${name}] sitemap ${record.url} -> ${discovered.length} URL(s)`);
    return { isSitemap: true, discovered };
  }

  const html = res.body.toString('utf-8');
  await ctx.sink.append(scrapePage(record.url, html, res.statusCode, ctx.config.excerptLength));
  const discovered = extractLinks(res.url || record.url, html).map((u) => ({ url: u, isSitemap: false }));
  return { isSitemap: false, discovered };
}

// Retries are re-pushed with exponential backoff rather than immediately,
// so a dead host does not spin a worker.
async function recordFailure(ctx: WorkerContext, name: string, url: string, err: CrawlError): Promise<ProcessOutcome> {
  const updated = await ctx.store.markRetryOrError(url, err.message);
  if (!updated) return 'skipped';
  if (updated.status === 'error') {
    console.error(`[${name}] marked error after ${updated.retryCount} attempt(s): ${url} error=${err.message}`);
    return 'error';
  }
  const delay = retryDelayMs(updated.retryCount, ctx.config.retryBackoffMs);
  ctx.queue.pushLater(url, delay);
  console.warn(`[${name}] retry ${updated.retryCount} in ${delay}ms: ${url} error=${err.message}`);
  return 'retry';
}

// Faults outside the fetch are not counted as retries; the URL just goes back
// to pending and is re-queued after the first backoff step.
async function releaseAfterFault(ctx: WorkerContext, name: string, url: string): Promise<void> {
  let released: boolean;
  try {
    released = await ctx.store.release(url);
  } catch (err) {
    console.error(`[${name}] could not release ${url}: ${errorMessage(err)}`);
    return;
  }
  if (!released) return;
  const delay = retryDelayMs(1, ctx.config.retryBackoffMs);
  ctx.queue.pushLater(url, delay);
  console.warn(`[${name}] released ${url} after a fault, re-queued in ${delay}ms`);
}
