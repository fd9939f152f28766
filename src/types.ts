export type UrlStatus = 'pending' | 'in_progress' | 'visited' | 'paused' | 'error';

export const URL_STATUSES: readonly UrlStatus[] = ['pending', 'in_progress', 'visited', 'paused', 'error'];

export function isUrlStatus(value: string): value is UrlStatus {
  return URL_STATUSES.some((s) => s === value);
}

export type UrlRecord = {
  url: string;
  status: UrlStatus;
  retryCount: number; // cumulative, never reset
  isSitemap: boolean;
  lastError: string | null;
  pauseReason: string | null;
  lastUpdated: Date;
};

export type StatusCounts = Record<UrlStatus, number>;

export type SetStatusResult =
  | { ok: true; record: UrlRecord }
  | { ok: false; reason: 'not_found' }
  | { ok: false; reason: 'invalid_transition'; status: UrlStatus };

export type CrawlerConfig = {
  workers: number; // 0 = auto
  delayMs: number; // per-worker politeness delay before each fetch
  maxRetries: number;
  retryBackoffMs: number;
  userAgent: string;
  timeoutMs: number;
  dequeueTimeoutMs: number;
  outputPath: string; // JSONL content sink
  excerptLength: number;
};

export type FetchResponse = {
  url: string; // final URL after redirects
  statusCode: number;
  contentType: string;
  body: Buffer;
};

export type PageRecord = {
  url: string;
  title: string;
  status_code: number;
  content: string;
};

export type SitemapEntry = {
  url: string;
  isSitemap: boolean;
};

export type NamedCount = {
  name: string;
  count: number;
};

export type CrawlStats = {
  totals: StatusCounts & { total: number };
  earliestSeed: string | null;
  topPausedDomains: NamedCount[];
  topPausedPrefixes: NamedCount[];
  domainDistribution: NamedCount[];
};

export type CrawlerStatus = {
  workers: number;
  running: boolean;
  queued: number;
  counts: StatusCounts;
};
