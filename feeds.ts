import { convert } from 'html-to-text';
import moment from 'moment';
import fetch from 'node-fetch';
import Parser from 'rss-parser';
import { USER_AGENT } from './config';
import { FetchError, errorMessage } from './errors';
import type { FetchLike } from './providers';
import type { FeedEntry, FeedFormat, FeedSource, FetchedFeed } from './types';
import { removeDuplicateArticlesByKey } from './utils';

// rss-parser copies an Atom entry's <id> onto the item
type FeedItem = { id?: string };

const parser: Parser<Record<string, unknown>, FeedItem> = new Parser();

export type FeedOptions = {
  maxItems: number;
  maxAgeHours: number;
  now?: () => Date;
};

export type FetchFeedOptions = FeedOptions & {
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

const plainTitle = (title: string) => convert(title, { wordwrap: false }).trim();

export const detectFeedFormat = (xml: string): FeedFormat =>
  /<feed[\s>]/i.test(xml) && !/<rss[\s>]/i.test(xml) ? 'atom' : 'rss';

export const parseFeedXml = async (xml: string, source: FeedSource, options: FeedOptions): Promise<FetchedFeed> => {
  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(xml);
  } catch (error) {
    throw new FetchError(source.xmlUrl, `Malformed feed: ${errorMessage(error)}`, { cause: error });
  }

  let entries: FeedEntry[] = [];
  for (const item of feed.items ?? []) {
    const link = item.link?.trim() ?? '';
    const guid = item.guid?.trim() || item.id?.trim() || link;
    if (!guid) continue;
    entries.push({
      guid,
      link,
      title: plainTitle(item.title ?? ''),
      summary: item.content ?? item.summary ?? item.contentSnippet ?? '',
      publishedAt: item.isoDate,
    });
  }

  // entries without a date are kept
  if (options.maxAgeHours > 0) {
    const cutoff = moment(options.now ? options.now() : new Date()).subtract(options.maxAgeHours, 'hours');
    entries = entries.filter((entry) => !entry.publishedAt || moment(entry.publishedAt).isAfter(cutoff));
  }

  entries = removeDuplicateArticlesByKey(entries, 'guid').slice(0, options.maxItems);

  return {
    source,
    format: detectFeedFormat(xml),
    title: plainTitle(feed.title ?? '') || source.title,
    link: feed.link ?? source.htmlUrl ?? source.xmlUrl,
    description: feed.description ?? '',
    entries,
  };
};

export const fetchFeed = async (source: FeedSource, options: FetchFeedOptions): Promise<FetchedFeed> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  let xml: string;
  try {
    const response = await fetchImpl(source.xmlUrl, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5',
      },
      timeout: options.timeoutMs,
    });
    if (!response.ok) {
      throw new FetchError(source.xmlUrl, `Feed responded with HTTP ${response.status}`, { status: response.status });
    }
    xml = await response.text();
  } catch (error) {
    if (error instanceof FetchError) throw error;
    throw new FetchError(source.xmlUrl, `Feed unreachable: ${errorMessage(error)}`, { cause: error });
  }
  return parseFeedXml(xml, source, options);
};
