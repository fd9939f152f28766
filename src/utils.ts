import type { NamedCount } from './types.js';

// Resolves early (never rejects) when the signal aborts.
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((res) => {
    if (signal?.aborted) return res();
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      res();
    }
  });
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Canonical frontier key: http(s) only, fragment dropped, scheme and host
 * lowercased by the URL parser. Returns null for anything else.
 */
export function normalizeUrl(input: string, base?: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  let u: URL;
  try {
    u = new URL(trimmed, base);
  } catch {
    return null;
  }
  if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
  u.hash = '';
  return u.toString();
}

export function hostOf(urlStr: string): string | null {
  try {
    const host = new URL(urlStr).host.toLowerCase();
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    return null;
  }
}

// host[/first-path-segment]
export function prefixOf(urlStr: string): string | null {
  const host = hostOf(urlStr);
  if (!host) return null;
  const first = new URL(urlStr).pathname.split('/').filter(Boolean)[0];
  return first ? `${host}/${first}` : host;
}

export function matchesDomain(urlStr: string, domain: string): boolean {
  const host = hostOf(urlStr);
  if (!host) return false;
  const want = domain.toLowerCase().replace(/^www\./, '');
  return host === want || host.endsWith('.' + want);
}

// Literal prefix pattern for SQL LIKE ... ESCAPE '\'
export function likePrefix(prefix: string): string {
  return prefix.replace(/[\\%_]/g, (ch) => '\\' + ch) + '%';
}

/** Most common values first; ties keep first-seen order. */
export function topCounts(values: Iterable<string | null>, limit: number): NamedCount[] {
  const counts = new Map<string, number>();
  for (const v of values) {
    if (v === null) continue;
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return Array.from(counts, ([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limit));
}
