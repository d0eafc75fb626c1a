import fetch from 'node-fetch';
import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from './logger';
import type { RunSummary } from './types';
import { constructSlackMessage, formatRunSummary, postToSlack, removeDuplicateArticlesByKey, slugify } from './utils';

vi.mock('node-fetch', () => ({ default: vi.fn() }));

const summary: RunSummary = {
  feeds: [
    {
      feedId: 'https://diario.example/rss',
      title: 'Diario',
      status: 'ok',
      fileName: 'diario.en.xml',
      translated: 2,
      cached: 1,
      partial: 0,
      skipped: 0,
      failed: 0,
    },
    {
      feedId: 'https://blog.example/atom',
      title: 'Blog',
      status: 'failed',
      error: 'Feed responded with HTTP 404',
      translated: 0,
      cached: 0,
      partial: 0,
      skipped: 0,
      failed: 0,
    },
  ],
  cacheDegraded: true,
  exitCode: 1,
};

describe('slugify', () => {
  it('reduces a title to a file-safe slug', () => {
    expect(slugify('  El País: Última Hora  ')).toBe('el-pais-ultima-hora');
    expect(slugify('C++ & Rust -- weekly')).toBe('c-rust-weekly');
    expect(slugify('日本語')).toBe('feed');
  });
});

describe('removeDuplicateArticlesByKey', () => {
  it('keeps the first item for each key', () => {
    const items = [
      { guid: 'a', title: 'one' },
      { guid: 'b', title: 'two' },
      { guid: 'a', title: 'three' },
    ];
    expect(removeDuplicateArticlesByKey(items, 'guid')).toEqual([
      { guid: 'a', title: 'one' },
      { guid: 'b', title: 'two' },
    ]);
  });
});

describe('formatRunSummary', () => {
  it('prints one line per feed and the exit status', () => {
    expect(formatRunSummary(summary)).toBe(
      [
        'ok      Diario -> diario.en.xml (translated=2 cached=1 partial=0 skipped=0 failed=0)',
        'FAILED  Blog :: Feed responded with HTTP 404',
        'cache unavailable: ran without caching',
        'exit status 1',
      ].join('\n'),
    );
  });
});

describe('constructSlackMessage', () => {
  it('summarizes published feeds', () => {
    const message = constructSlackMessage(summary);
    expect(message.text).toBe('Feed translation finished: 1/2 feeds published');
    expect(message.attachments.map((attachment) => attachment.title)).toEqual(['Diario', 'Blog']);
    expect(message.attachments[1]?.color).toBe('#d00000');
  });
});

describe('postToSlack', () => {
  it('logs a failed post instead of throwing', async () => {
    const failure = new Error('network down');
    vi.mocked(fetch).mockRejectedValueOnce(failure);
    const log = { ...silentLogger(), error: vi.fn() };

    await postToSlack('https://hooks.example/services/test', { text: 'hi' }, log);

    expect(fetch).toHaveBeenCalledWith(
      'https://hooks.example/services/test',
      expect.objectContaining({ method: 'POST', body: JSON.stringify({ text: 'hi' }) }),
    );
    expect(log.error).toHaveBeenCalledWith('failed to post run summary to Slack', failure);
  });
});
