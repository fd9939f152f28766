import * as cheerio from 'cheerio';
import type { PageRecord } from './types.js';
import { ensureAbsoluteUrl, normalizeUrl } from './utils.js';

export function scrapePage(url: string, html: string, statusCode: number, excerptLength = 500): PageRecord {
  const $ = cheerio.load(html);
  const title = $('title').first().text().trim();

  $('script, style, noscript, template').remove();
  // keep words from adjacent elements apart
  $('body').find('*').append(' ');
  const text = $('body').text().replace(/\s+/g, ' ').trim();

  return {
    url,
    title,
    status_code: statusCode,
    content: text.slice(0, Math.max(0, excerptLength))
  };
}

/** Outbound http(s) links, normalized, first occurrence order. */
export function extractLinks(baseUrl: string, html: string): string[] {
  const $ = cheerio.load(html);
  const base = $('base[href]').attr('href');
  const resolveFrom = ensureAbsoluteUrl(baseUrl, base) ?? baseUrl;

  const links = new Set<string>();
  $('a[href]').each((_, a) => {
    const href = $(a).attr('href');
    if (!href) return;
    const abs = normalizeUrl(href, resolveFrom);
    if (abs) links.add(abs);
  });
  return Array.from(links);
}
