import { describe, it, expect, vi, afterEach } from 'vitest';
import { RssAdapter } from '../rss.js';

const xml = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/">
  <channel>
    <title>Feed</title>
    <item>
      <title>First</title>
      <link>https://ex.com/1</link>
      <description>Summary one</description>
      <pubDate>Wed, 10 Jan 2024 08:00:00 GMT</pubDate>
      <media:thumbnail url="https://img.ex.com/1.jpg"/>
    </item>
    <item>
      <title>Second</title>
      <link>https://ex.com/2</link>
      <enclosure url="https://img.ex.com/2.png" type="image/png" length="1"/>
    </item>
    <item>
      <title>Third</title>
      <link>https://ex.com/3</link>
    </item>
  </channel>
</rss>`;

const options = { perFeedLimit: 2, timeoutMs: 1000, userAgent: 'test-agent' };

describe('RssAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps feed items up to the per-feed limit', async () => {
    const fetchMock = vi.fn(async () => new Response(xml));
    vi.stubGlobal('fetch', fetchMock);

    const result = await new RssAdapter({ name: 'Feed', url: 'https://ex.com/rss' }, options).fetch();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.source).toBe('Feed');
    expect(result.errors).toEqual([]);
    expect(result.results.map(r => r.link)).toEqual(['https://ex.com/1', 'https://ex.com/2']);
    expect(result.results[0]).toMatchObject({
      title: 'First',
      summary: 'Summary one',
      image: 'https://img.ex.com/1.jpg',
      publishedAt: 'Wed, 10 Jan 2024 08:00:00 GMT',
      sourceName: 'Feed',
    });
    expect(result.results[1].image).toBe('https://img.ex.com/2.png');
    expect(result.results[1].publishedAt).toBeUndefined();
  });

  it('returns an error instead of throwing on HTTP failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('oops', { status: 500, statusText: 'Internal Server Error' })));

    const result = await new RssAdapter({ name: 'Feed', url: 'https://ex.com/rss' }, options).fetch();

    expect(result).toEqual({ source: 'Feed', results: [], errors: ['Feed: HTTP 500: Internal Server Error'] });
  });
});
