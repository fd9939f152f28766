import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { WorkQueue } from '../queue.js';
import type { ContentSink } from '../storage.js';
import { processUrl, runWorker, type WorkerContext } from '../worker.js';
import { FakeFetcher, MemorySink, html, sitemapIndex, urlset } from './helpers/fakes.js';
import { MemoryFrontierStore } from './helpers/memory-store.js';

const ROOT = 'https://a.com/';

describe('worker', () => {
  let store: MemoryFrontierStore;
  let queue: WorkQueue;
  let sink: MemorySink;
  let fetcher: FakeFetcher;
  let ac: AbortController;

  function ctx(overrides: Partial<WorkerContext> = {}): WorkerContext {
    return {
      store,
      queue,
      fetcher,
      sink,
      config: { delayMs: 0, dequeueTimeoutMs: 20, retryBackoffMs: 0, excerptLength: 500 },
      signal: ac.signal,
      ...overrides
    };
  }

  beforeEach(() => {
    store = new MemoryFrontierStore(3);
    queue = new WorkQueue();
    sink = new MemorySink();
    fetcher = new FakeFetcher();
    ac = new AbortController();
  });

  afterEach(() => {
    ac.abort();
    queue.close();
  });

  it('visits a page, saves it and enqueues newly discovered links', async () => {
    await store.upsertNew(ROOT, false);
    await store.upsertNew('https://a.com/known', false);
    fetcher.set(ROOT, { body: html('Home', ['/a', '/b#x', '/known', 'https://other.com/c']) });

    expect(await processUrl(ctx(), 'w1', ROOT)).toBe('visited');

    expect((await store.get(ROOT))?.status).toBe('visited');
    expect(queue.snapshot()).toEqual(['https://a.com/a', 'https://a.com/b', 'https://other.com/c']);
    expect((await store.get('https://a.com/b'))?.status).toBe('pending');
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({ url: ROOT, title: 'Home', status_code: 200 });
  });

  it('drops URLs that are no longer pending without fetching them', async () => {
    store.put(ROOT, 'paused');
    expect(await processUrl(ctx(), 'w1', ROOT)).toBe('skipped');
    expect(await processUrl(ctx(), 'w1', 'https://a.com/unknown')).toBe('skipped');
    expect(fetcher.calls).toEqual([]);
  });

  it('lets only one of two racing workers process the same URL', async () => {
    await store.upsertNew(ROOT, false);
    fetcher.set(ROOT, { body: html('Home') });
    const outcomes = await Promise.all([processUrl(ctx(), 'w1', ROOT), processUrl(ctx(), 'w2', ROOT)]);
    expect(outcomes.sort()).toEqual(['skipped', 'visited']);
    expect(sink.records).toHaveLength(1);
    expect(fetcher.calls).toEqual([ROOT]);
  });

  it('counts every failure and marks error only after the fourth with maxRetries=3', async () => {
    await store.upsertNew(ROOT, false);
    fetcher.set(ROOT, 'fail');

    for (let attempt = 1; attempt <= 3; attempt++) {
      expect(await processUrl(ctx(), 'w1', ROOT)).toBe('retry');
      const row = await store.get(ROOT);
      expect(row?.retryCount).toBe(attempt);
      expect(row?.status).toBe('pending');
    }

    expect(await processUrl(ctx(), 'w1', ROOT)).toBe('error');
    const row = await store.get(ROOT);
    expect(row?.retryCount).toBe(4);
    expect(row?.status).toBe('error');
    expect(row?.lastError).toBe(`connect ECONNREFUSED ${ROOT}`);

    expect(await processUrl(ctx(), 'w1', ROOT)).toBe('skipped');
    expect(fetcher.calls).toHaveLength(4);
  });

  it('re-pushes a retry after the backoff delay', async () => {
    vi.useFakeTimers();
    try {
      await store.upsertNew(ROOT, false);
      fetcher.set(ROOT, 'fail');
      const c = ctx({ config: { delayMs: 0, dequeueTimeoutMs: 20, retryBackoffMs: 1000, excerptLength: 500 } });
      expect(await processUrl(c, 'w1', ROOT)).toBe('retry');
      expect(queue.size()).toBe(0);
      vi.advanceTimersByTime(1000);
      expect(queue.snapshot()).toEqual([ROOT]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('expands a sitemap index into nested sitemap rows', async () => {
    const url = 'https://a.com/sitemap.xml';
    const children = ['https://a.com/s1.xml', 'https://a.com/s2.xml', 'https://a.com/s3.xml'];
    await store.upsertNew(url, true);
    fetcher.set(url, { contentType: 'application/xml', body: sitemapIndex(children) });

    expect(await processUrl(ctx(), 'w1', url)).toBe('visited');

    for (const child of children) {
      expect(await store.get(child)).toMatchObject({ status: 'pending', isSitemap: true });
    }
    expect(queue.snapshot()).toEqual(children);
    expect((await store.get(url))?.isSitemap).toBe(true);
    expect(sink.records).toEqual([]);
  });

  it('expands a urlset into page rows', async () => {
    const url = 'https://a.com/pages.xml';
    const pages = Array.from({ length: 10 }, (_, i) => `https://a.com/page-${i + 1}`);
    await store.upsertNew(url, true);
    fetcher.set(url, { contentType: 'text/xml', body: urlset(pages) });

    expect(await processUrl(ctx(), 'w1', url)).toBe('visited');

    const added = await store.listByPrefix('https://a.com/page-');
    expect(added).toHaveLength(10);
    expect(added.every((r) => r.status === 'pending' && !r.isSitemap)).toBe(true);
  });

  it('treats a malformed sitemap as a fetch failure', async () => {
    const url = 'https://a.com/feed.xml';
    await store.upsertNew(url, true);
    fetcher.set(url, { contentType: 'application/xml', body: '<?xml version="1.0"?><rss><channel/></rss>' });

    expect(await processUrl(ctx(), 'w1', url)).toBe('retry');
    expect(await store.get(url)).toMatchObject({ status: 'pending', retryCount: 1 });
  });

  it('sniffs the response when the sitemap flag is wrong', async () => {
    const url = 'https://a.com/sitemap.xml';
    await store.upsertNew(url, true);
    fetcher.set(url, { contentType: 'text/html', body: html('Actually a page') });

    expect(await processUrl(ctx(), 'w1', url)).toBe('visited');
    expect((await store.get(url))?.isSitemap).toBe(false);
    expect(sink.records.map((r) => r.title)).toEqual(['Actually a page']);
  });

  it('releases the claim when shutdown arrives during the politeness delay', async () => {
    await store.upsertNew(ROOT, false);
    fetcher.set(ROOT, { body: html('Home') });
    const c = ctx({ config: { delayMs: 10_000, dequeueTimeoutMs: 20, retryBackoffMs: 0, excerptLength: 500 } });

    const p = processUrl(c, 'w1', ROOT);
    ac.abort();

    expect(await p).toBe('released');
    expect(await store.get(ROOT)).toMatchObject({ status: 'pending', retryCount: 0 });
    expect(fetcher.calls).toEqual([]);
  });

  it('releases the claim and rethrows on a non-fetch fault', async () => {
    await store.upsertNew(ROOT, false);
    fetcher.set(ROOT, { body: html('Home') });
    const failing: ContentSink = {
      append: async () => {
        throw new Error('disk full');
      }
    };

    await expect(processUrl(ctx({ sink: failing }), 'w1', ROOT)).rejects.toThrow('disk full');
    expect(await store.get(ROOT)).toMatchObject({ status: 'pending', retryCount: 0 });
    await vi.waitFor(() => expect(queue.snapshot()).toEqual([ROOT]));
  });

  it('releases and re-queues when recording a fetch failure fails', async () => {
    const bad = 'https://a.com/bad';
    await store.upsertNew(bad, false);
    fetcher.set(bad, 'fail');
    vi.spyOn(store, 'markRetryOrError').mockRejectedValueOnce(new Error('connection reset'));

    await expect(processUrl(ctx(), 'w1', bad)).rejects.toThrow('connection reset');
    expect(await store.get(bad)).toMatchObject({ status: 'pending', retryCount: 0 });
    await vi.waitFor(() => expect(queue.snapshot()).toEqual([bad]));
  });

  it('finishes a page whose first save failed', async () => {
    await store.upsertNew(ROOT, false);
    fetcher.set(ROOT, { body: html('Home') });
    let failures = 1;
    const flaky: ContentSink = {
      append: async (record) => {
        if (failures-- > 0) throw new Error('EAGAIN');
        sink.records.push(record);
      }
    };
    queue.push(ROOT);

    const done = runWorker(ctx({ sink: flaky }), 'w1');
    await vi.waitFor(async () => expect((await store.get(ROOT))?.status).toBe('visited'));
    ac.abort();
    await done;

    expect(fetcher.calls).toEqual([ROOT, ROOT]);
    expect(sink.records.map((r) => r.title)).toEqual(['Home']);
    expect((await store.get(ROOT))?.retryCount).toBe(0);
  });

  it('keeps looping past failures until the signal aborts', async () => {
    const bad = 'https://a.com/bad';
    await store.upsertNew(bad, false);
    await store.upsertNew(ROOT, false);
    fetcher.set(bad, 'fail');
    fetcher.set(ROOT, { body: html('Home') });
    queue.push(bad);
    queue.push(ROOT);

    const done = runWorker(ctx(), 'w1');
    await vi.waitFor(async () => {
      expect((await store.get(ROOT))?.status).toBe('visited');
      expect(await store.get(bad)).toMatchObject({ status: 'error', retryCount: 4 });
    });
    ac.abort();
    await done;

    expect(fetcher.calls.filter((u) => u === bad)).toHaveLength(4);
  });
});
