import { describe, it, expect } from 'vitest';
import { extractLinks, scrapePage } from '../scrape_page.js';

describe('scrapePage', () => {
  it('extracts title and visible text without scripts or styles', () => {
    const page =
      '<html><head><title> Hello </title><style>p { color: red }</style></head>' +
      '<body><h1>Head</h1><p>First <b>bold</b> text</p><script>var x = 1;</script><p>Second</p></body></html>';
    expect(scrapePage('https://a.com/', page, 200)).toEqual({
      url: 'https://a.com/',
      title: 'Hello',
      status_code: 200,
      content: 'Head First bold text Second'
    });
  });

  it('bounds the excerpt length', () => {
    expect(scrapePage('https://a.com/', '<p>abcdefghij</p>', 200, 4).content).toBe('abcd');
  });

  it('returns an empty title when the page has none', () => {
    expect(scrapePage('https://a.com/', '<p>x</p>', 203).title).toBe('');
  });
});

describe('extractLinks', () => {
  it('resolves, normalizes and de-duplicates http(s) links', () => {
    const page =
      '<a href="/x#frag">x</a><a href="y">y</a><a href="mailto:a@b.c">m</a>' +
      '<a href="HTTPS://B.COM/Z">z</a><a href="/x">dup</a><a>none</a><a href="javascript:void(0)">j</a>';
    expect(extractLinks('https://a.com/dir/page', page)).toEqual([
      'https://a.com/x',
      'https://a.com/dir/y',
      'https://b.com/Z'
    ]);
  });

  it('honours <base href>', () => {
    const page = '<html><head><base href="https://cdn.a.com/root/"></head><body><a href="p">p</a></body></html>';
    expect(extractLinks('https://a.com/', page)).toEqual(['https://cdn.a.com/root/p']);
  });
});
