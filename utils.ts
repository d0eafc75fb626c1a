import fetch from 'node-fetch';
import type { Logger } from './logger';
import type { FeedRunStats, RunSummary } from './types';

export const slugify = (value: string) => {
  const slug = value
    .trim()
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'feed';
};

export const removeDuplicateArticlesByKey = <T, K extends keyof T>(arr: T[], key: K): T[] => {
  const uniqueKeys = new Set<T[K]>();
  const uniqueArray: T[] = [];

  for (const obj of arr) {
    if (!uniqueKeys.has(obj[key])) {
      uniqueKeys.add(obj[key]);
      uniqueArray.push(obj);
    }
  }

  return uniqueArray;
};

const formatFeedLine = (feed: FeedRunStats) => {
  if (feed.status === 'failed') {
    return `FAILED  ${feed.title} :: ${feed.error ?? 'unknown error'}`;
  }
  const counts = [
    `translated=${feed.translated}`,
    `cached=${feed.cached}`,
    `partial=${feed.partial}`,
    `skipped=${feed.skipped}`,
    `failed=${feed.failed}`,
  ].join(' ');
  return `ok      ${feed.title} -> ${feed.fileName ?? '-'} (${counts})`;
};

export const formatRunSummary = (summary: RunSummary) => {
  const lines = summary.feeds.map(formatFeedLine);
  if (summary.cacheDegraded) lines.push('cache unavailable: ran without caching');
  lines.push(`exit status ${summary.exitCode}`);
  return lines.join('\n');
};

export const constructSlackMessage = (summary: RunSummary) => {
  const failedFeeds = summary.feeds.filter((feed) => feed.status === 'failed').length;
  const color = summary.exitCode === 0 ? '#36a64f' : failedFeeds > 0 ? '#d00000' : '#e8a317';
  return {
    text: `Feed translation finished: ${summary.feeds.length - failedFeeds}/${summary.feeds.length} feeds published`,
    attachments: summary.feeds.map((feed) => ({
      color: feed.status === 'failed' ? '#d00000' : color,
      title: feed.title,
      fields: [
        {
          title: 'Result',
          value: formatFeedLine(feed),
          short: false,
        },
      ],
    })),
  };
};

export const postToSlack = async (webhookUrl: string, data: unknown, log: Logger) => {
  try {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      body: JSON.stringify(data),
      headers: {
        'Content-Type': 'application/json',
      },
    });

    if (!response.ok) {
      throw new Error(`Error: ${response.statusText}`);
    }
    log.debug(`slack responded: ${await response.text()}`);
  } catch (error) {
    log.error('failed to post run summary to Slack', error);
  }
};
