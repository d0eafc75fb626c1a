import { Response, type RequestInit } from 'node-fetch';
import { describe, expect, it, vi } from 'vitest';
import { USER_AGENT } from './config';
import { FetchError } from './errors';
import { detectFeedFormat, fetchFeed, parseFeedXml } from './feeds';
import type { FeedSource } from './types';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Diario</title>
    <link>https://diario.example/</link>
    <description>Noticias</description>
    <item>
      <title>Primera &amp; única</title>
      <link>https://diario.example/1</link>
      <guid>g-1</guid>
      <pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate>
      <description>Resumen uno</description>
    </item>
    <item>
      <title>Segunda</title>
      <link>https://diario.example/2</link>
      <pubDate>Sun, 05 Jan 2025 10:00:00 GMT</pubDate>
      <description>Resumen dos</description>
    </item>
    <item>
      <title>Repetida</title>
      <link>https://diario.example/1b</link>
      <guid>g-1</guid>
      <description>Otra vez</description>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Blog</title>
  <link href="https://blog.example/"/>
  <id>urn:blog</id>
  <updated>2025-01-02T00:00:00Z</updated>
  <entry>
    <title>Hallo</title>
    <link href="https://blog.example/hallo"/>
    <id>urn:entry:1</id>
    <updated>2025-01-02T00:00:00Z</updated>
    <summary>Kurz</summary>
  </entry>
</feed>`;

const source: FeedSource = { title: 'Diario (OPML)', xmlUrl: 'https://diario.example/rss' };

const noLimits = { maxItems: 30, maxAgeHours: 0 };

describe('detectFeedFormat', () => {
  it('tells RSS from Atom', () => {
    expect(detectFeedFormat(RSS)).toBe('rss');
    expect(detectFeedFormat(ATOM)).toBe('atom');
  });
});

describe('parseFeedXml', () => {
  it('reads RSS entries and drops repeated guids', async () => {
    const feed = await parseFeedXml(RSS, source, noLimits);

    expect(feed.format).toBe('rss');
    expect(feed.title).toBe('Diario');
    expect(feed.link).toBe('https://diario.example/');
    expect(feed.description).toBe('Noticias');
    expect(feed.entries).toEqual([
      {
        guid: 'g-1',
        link: 'https://diario.example/1',
        title: 'Primera & única',
        summary: 'Resumen uno',
        publishedAt: '2025-01-06T10:00:00.000Z',
      },
      {
        guid: 'https://diario.example/2',
        link: 'https://diario.example/2',
        title: 'Segunda',
        summary: 'Resumen dos',
        publishedAt: '2025-01-05T10:00:00.000Z',
      },
    ]);
  });

  it('keeps at most maxItems entries', async () => {
    const feed = await parseFeedXml(RSS, source, { maxItems: 1, maxAgeHours: 0 });
    expect(feed.entries.map((entry) => entry.guid)).toEqual(['g-1']);
  });

  it('drops entries older than maxAgeHours', async () => {
    const feed = await parseFeedXml(RSS, source, {
      maxItems: 30,
      maxAgeHours: 24,
      now: () => new Date('2025-01-06T20:00:00.000Z'),
    });
    expect(feed.entries.map((entry) => entry.guid)).toEqual(['g-1']);
  });

  it('reads Atom entries by id', async () => {
    const feed = await parseFeedXml(ATOM, { title: 'Blog', xmlUrl: 'https://blog.example/atom' }, noLimits);

    expect(feed.format).toBe('atom');
    expect(feed.title).toBe('Blog');
    expect(feed.link).toBe('https://blog.example/');
    expect(feed.entries).toHaveLength(1);
    expect(feed.entries[0]).toMatchObject({
      guid: 'urn:entry:1',
      link: 'https://blog.example/hallo',
      title: 'Hallo',
      summary: 'Kurz',
    });
  });

  it('rejects a document that is not a feed', async () => {
    await expect(parseFeedXml('not a feed at all', source, noLimits)).rejects.toBeInstanceOf(FetchError);
  });
});

describe('fetchFeed', () => {
  it('fetches with the user agent and timeout', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response(RSS, { status: 200 }));

    const feed = await fetchFeed(source, { ...noLimits, timeoutMs: 5000, fetchImpl });

    expect(feed.entries).toHaveLength(2);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://diario.example/rss');
    expect(init?.timeout).toBe(5000);
    expect(init?.headers).toMatchObject({ 'User-Agent': USER_AGENT });
  });

  it('fails on an error status', async () => {
    const fetchImpl = async () => new Response('gone', { status: 404 });
    await expect(fetchFeed(source, { ...noLimits, timeoutMs: 5000, fetchImpl })).rejects.toMatchObject({
      name: 'FetchError',
      status: 404,
      url: 'https://diario.example/rss',
    });
  });

  it('wraps network errors', async () => {
    const fetchImpl = async (): Promise<Response> => {
      throw new Error('ECONNREFUSED');
    };
    await expect(fetchFeed(source, { ...noLimits, timeoutMs: 5000, fetchImpl })).rejects.toThrow(
      'Feed unreachable: ECONNREFUSED',
    );
  });
});
