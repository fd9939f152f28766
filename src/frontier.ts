import pLimit from 'p-limit';
import type { Database } from './db.js';
import { canTransition, statusAfterFailure } from './transitions.js';
import { isUrlStatus } from './types.js';
import type { NamedCount, SetStatusResult, StatusCounts, UrlRecord, UrlStatus } from './types.js';
import { hostOf, likePrefix, topCounts } from './utils.js';

/**
 * Durable URL -> state table. The single source of truth for the crawl;
 * the in-memory work queue is only a cache of candidates.
 */
export interface FrontierStore {
  /** Inserts a pending row. False when the URL is already known. */
  upsertNew(url: string, isSitemap: boolean): Promise<boolean>;
  get(url: string): Promise<UrlRecord | null>;
  /** pending -> in_progress. Null when the row is missing or not pending. */
  claim(url: string): Promise<UrlRecord | null>;
  /** in_progress -> pending without counting a retry. */
  release(url: string): Promise<boolean>;
  markVisited(url: string, isSitemap: boolean): Promise<boolean>;
  markRetryOrError(url: string, error: string): Promise<UrlRecord | null>;
  setStatus(url: string, status: UrlStatus, reason?: string): Promise<SetStatusResult>;
  listByStatus(status: UrlStatus): Promise<UrlRecord[]>;
  listByPrefix(prefix: string, status?: UrlStatus): Promise<UrlRecord[]>;
  pauseByPrefix(prefix: string, reason: string): Promise<string[]>;
  resumeByPrefix(prefix: string): Promise<string[]>;
  resumeAllPaused(): Promise<string[]>;
  /** Rows left in_progress by a crashed run go back to pending. */
  recoverInProgress(): Promise<number>;
  countsByStatus(): Promise<StatusCounts>;
  countsByDomain(limit: number, status?: UrlStatus): Promise<NamedCount[]>;
  earliestUrl(): Promise<string | null>;
  close(): Promise<void>;
}

export type FrontierOptions = {
  maxRetries: number;
};

export function emptyCounts(): StatusCounts {
  return { pending: 0, in_progress: 0, visited: 0, paused: 0, error: 0 };
}

type UrlRow = {
  url: string;
  status: string;
  retry_count: number;
  is_sitemap: boolean;
  last_error: string | null;
  pause_reason: string | null;
  last_updated: Date;
};

const COLS = 'url, status, retry_count, is_sitemap, last_error, pause_reason, last_updated';

function toRecord(row: UrlRow): UrlRecord {
  if (!isUrlStatus(row.status)) {
    throw new Error(`[frontier] unknown status ${JSON.stringify(row.status)} for ${row.url}`);
  }
  return {
    url: row.url,
    status: row.status,
    retryCount: row.retry_count,
    isSitemap: row.is_sitemap,
    lastError: row.last_error,
    pauseReason: row.pause_reason,
    lastUpdated: row.last_updated
  };
}

/**
 * Postgres-backed frontier. Every mutation goes through a single-slot queue
 * (one logical writer); reads go straight to the database and never wait on it.
 */
export class PgFrontierStore implements FrontierStore {
  private writes = pLimit(1);
  private closing: Promise<void> | null = null;

  constructor(private readonly db: Database, private readonly opts: FrontierOptions) {}

  private write<T>(fn: () => Promise<T>): Promise<T> {
    if (this.closing) return Promise.reject(new Error('[frontier] store is closed'));
    return this.writes(fn);
  }

  private async one(sql: string, params: unknown[]): Promise<UrlRecord | null> {
    const res = await this.db.query<UrlRow>(sql, params);
    const row = res.rows[0];
    return row ? toRecord(row) : null;
  }

  private async many(sql: string, params: unknown[]): Promise<UrlRecord[]> {
    const res = await this.db.query<UrlRow>(sql, params);
    return res.rows.map(toRecord);
  }

  private async urls(sql: string, params: unknown[]): Promise<string[]> {
    const res = await this.db.query<{ url: string }>(sql, params);
    return res.rows.map((r) => r.url);
  }

  upsertNew(url: string, isSitemap: boolean): Promise<boolean> {
    return this.write(async () => {
      const res = await this.db.query(
        `INSERT INTO crawler.urls (url, status, retry_count, is_sitemap, last_updated)
         VALUES ($1, 'pending', 0, $2, now())
         ON CONFLICT (url) DO NOTHING`,
        [url, isSitemap]
      );
      return (res.rowCount ?? 0) > 0;
    });
  }

  get(url: string): Promise<UrlRecord | null> {
    return this.one(`SELECT ${COLS} FROM crawler.urls WHERE url = $1`, [url]);
  }

  claim(url: string): Promise<UrlRecord | null> {
    return this.write(() =>
      this.one(
        `UPDATE crawler.urls SET status = 'in_progress', last_updated = now()
         WHERE url = $1 AND status = 'pending'
         RETURNING ${COLS}`,
        [url]
      )
    );
  }

  release(url: string): Promise<boolean> {
    return this.write(async () => {
      const res = await this.db.query(
        `UPDATE crawler.urls SET status = 'pending', last_updated = now()
         WHERE url = $1 AND status = 'in_progress'`,
        [url]
      );
      return (res.rowCount ?? 0) > 0;
    });
  }

  markVisited(url: string, isSitemap: boolean): Promise<boolean> {
    return this.write(async () => {
      const res = await this.db.query(
        `UPDATE crawler.urls
         SET status = 'visited', is_sitemap = $2, last_error = NULL, last_updated = now()
         WHERE url = $1 AND status IN ('pending', 'in_progress')`,
        [url, isSitemap]
      );
      return (res.rowCount ?? 0) > 0;
    });
  }

  markRetryOrError(url: string, error: string): Promise<UrlRecord | null> {
    return this.write(async () => {
      const current = await this.get(url);
      if (!current || (current.status !== 'pending' && current.status !== 'in_progress')) return null;
      const retryCount = current.retryCount + 1;
      return this.one(
        `UPDATE crawler.urls
         SET status = $2, retry_count = $3, last_error = $4, last_updated = now()
         WHERE url = $1
         RETURNING ${COLS}`,
        [url, statusAfterFailure(retryCount, this.opts.maxRetries), retryCount, error]
      );
    });
  }

  setStatus(url: string, status: UrlStatus, reason?: string): Promise<SetStatusResult> {
    return this.write(async (): Promise<SetStatusResult> => {
      const current = await this.get(url);
      if (!current) return { ok: false, reason: 'not_found' };
      if (!canTransition(current.status, status)) {
        return { ok: false, reason: 'invalid_transition', status: current.status };
      }
      const record = await this.one(
        `UPDATE crawler.urls
         SET status = $2, pause_reason = $3, last_updated = now()
         WHERE url = $1
         RETURNING ${COLS}`,
        [url, status, status === 'paused' ? reason ?? null : null]
      );
      return record ? { ok: true, record } : { ok: false, reason: 'not_found' };
    });
  }

  listByStatus(status: UrlStatus): Promise<UrlRecord[]> {
    return this.many(`SELECT ${COLS} FROM crawler.urls WHERE status = $1 ORDER BY id ASC`, [status]);
  }

  listByPrefix(prefix: string, status?: UrlStatus): Promise<UrlRecord[]> {
    const params: unknown[] = [likePrefix(prefix)];
    let where = `url LIKE $1 ESCAPE '\\'`;
    if (status) {
      params.push(status);
      where += ' AND status = $2';
    }
    return this.many(`SELECT ${COLS} FROM crawler.urls WHERE ${where} ORDER BY id ASC`, params);
  }

  pauseByPrefix(prefix: string, reason: string): Promise<string[]> {
    return this.write(() =>
      this.urls(
        `UPDATE crawler.urls
         SET status = 'paused', pause_reason = $2, last_updated = now()
         WHERE url LIKE $1 ESCAPE '\\' AND status = 'pending'
         RETURNING url`,
        [likePrefix(prefix), reason]
      )
    );
  }

  resumeByPrefix(prefix: string): Promise<string[]> {
    return this.write(() =>
      this.urls(
        `UPDATE crawler.urls
         SET status = 'pending', pause_reason = NULL, last_updated = now()
         WHERE url LIKE $1 ESCAPE '\\' AND status = 'paused'
         RETURNING url`,
        [likePrefix(prefix)]
      )
    );
  }

  resumeAllPaused(): Promise<string[]> {
    return this.write(() =>
      this.urls(
        `UPDATE crawler.urls
         SET status = 'pending', pause_reason = NULL, last_updated = now()
         WHERE status = 'paused'
         RETURNING url`,
        []
      )
    );
  }

  recoverInProgress(): Promise<number> {
    return this.write(async () => {
      const res = await this.db.query(
        `UPDATE crawler.urls SET status = 'pending', last_updated = now() WHERE status = 'in_progress'`
      );
      return res.rowCount ?? 0;
    });
  }

  async countsByStatus(): Promise<StatusCounts> {
    const res = await this.db.query<{ status: string; n: number }>(
      'SELECT status, COUNT(*)::int AS n FROM crawler.urls GROUP BY status'
    );
    const counts = emptyCounts();
    for (const row of res.rows) {
      if (isUrlStatus(row.status)) counts[row.status] = row.n;
    }
    return counts;
  }

  async countsByDomain(limit: number, status?: UrlStatus): Promise<NamedCount[]> {
    const urls = status
      ? await this.urls('SELECT url FROM crawler.urls WHERE status = $1', [status])
      : await this.urls('SELECT url FROM crawler.urls', []);
    return topCounts(urls.map(hostOf), limit);
  }

  async earliestUrl(): Promise<string | null> {
    const urls = await this.urls('SELECT url FROM crawler.urls ORDER BY id ASC LIMIT 1', []);
    return urls[0] ?? null;
  }

  close(): Promise<void> {
    // queued writes drain before the database is closed
    this.closing ??= this.writes(async () => undefined).then(async () => {
      await this.db.end();
      console.log('[frontier] connection closed');
    });
    return this.closing;
  }
}
