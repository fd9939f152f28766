import * as cheerio from 'cheerio';
import { gunzipSync } from 'node:zlib';
import { SitemapError, errorMessage } from './errors.js';
import type { SitemapEntry } from './types.js';
import { normalizeUrl } from './utils.js';

const SITEMAP_ROOT = /^\s*(<\?xml\b|<([\w-]+:)?(urlset|sitemapindex)\b)/i;

export function looksLikeSitemapUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.endsWith('.xml') || lower.endsWith('.xml.gz') || lower.includes('sitemap');
}

export function isGzip(body: Buffer): boolean {
  return body.length >= 2 && body[0] === 0x1f && body[1] === 0x8b;
}

/**
 * Decides from the actual response whether a fetched document is a sitemap.
 * The stored flag is only a tie-breaker when the response says nothing.
 */
export function isSitemapResponse(url: string, contentType: string, body: Buffer, flagged: boolean): boolean {
  const type = contentType.toLowerCase();
  if (isGzip(body)) return true;
  if (type.includes('html')) return false;
  if (type.includes('xml') || type.includes('gzip')) return true;
  if (SITEMAP_ROOT.test(body.subarray(0, 512).toString('utf-8'))) return true;
  const lower = url.toLowerCase();
  return lower.endsWith('.xml') || lower.endsWith('.xml.gz') || flagged;
}

function decode(body: Buffer, url: string): string {
  if (!isGzip(body)) return body.toString('utf-8');
  try {
    return gunzipSync(body).toString('utf-8');
  } catch (err) {
    throw new SitemapError(`failed to decompress ${url}: ${errorMessage(err)}`, { cause: err });
  }
}

// drops any namespace prefix: <sm:urlset> -> urlset
function localName(tag: string): string {
  const name = tag.toLowerCase();
  const colon = name.indexOf(':');
  return colon >= 0 ? name.slice(colon + 1) : name;
}

/**
 * Expands a sitemap document into the URLs it lists. A `sitemapindex` yields
 * nested sitemaps, a `urlset` yields pages. Throws SitemapError for anything
 * that is not one of the two.
 */
export function expandSitemap(body: Buffer, contentType: string, url: string): SitemapEntry[] {
  const xml = decode(body, url);
  if (!xml.trimStart().startsWith('<')) {
    throw new SitemapError(`not an XML document: ${url} (${contentType || 'no content type'})`);
  }

  const $ = cheerio.load(xml, { xml: true });
  const root = $.root().children().first();
  const rootEl = root.get(0);
  if (!rootEl) throw new SitemapError(`empty sitemap document: ${url}`);

  const kind = localName(rootEl.name);
  let childName: string;
  let isSitemap: boolean;
  if (kind === 'sitemapindex') {
    childName = 'sitemap';
    isSitemap = true;
  } else if (kind === 'urlset') {
    childName = 'url';
    isSitemap = false;
  } else {
    throw new SitemapError(`unrecognized sitemap root <${rootEl.name}> in ${url}`);
  }

  const seen = new Set<string>();
  const out: SitemapEntry[] = [];
  root.children().each((_, el) => {
    if (localName(el.name) !== childName) return;
    const loc = $(el)
      .children()
      .filter((_, c) => localName(c.name) === 'loc')
      .first()
      .text();
    const abs = normalizeUrl(loc);
    if (!abs || seen.has(abs)) return;
    seen.add(abs);
    out.push({ url: abs, isSitemap });
  });
  return out;
}
