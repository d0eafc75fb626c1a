import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { XMLBuilder } from 'fast-xml-parser';
import moment from 'moment';
import type { FeedSource, TranslatedEntry, TranslatedFeed } from './types';
import { slugify } from './utils';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const GENERATOR = 'rss-translate';
const SNIPPET_CHARS = 600;
const EPOCH = '1970-01-01T00:00:00.000Z';

export type RenderOptions = {
  includeOriginalSnippet: boolean;
};

/**
 * Output file per feed, `{slug}.{lang}.xml`. A slug shared by two feeds gets
 * a short hash of the feed URL, so names do not depend on fetch results.
 */
export const assignFileNames = (sources: FeedSource[], targetLang: string): Map<string, string> => {
  const slugCounts = new Map<string, number>();
  for (const source of sources) {
    const slug = slugify(source.title);
    slugCounts.set(slug, (slugCounts.get(slug) ?? 0) + 1);
  }

  const names = new Map<string, string>();
  for (const source of sources) {
    const slug = slugify(source.title);
    const suffix = (slugCounts.get(slug) ?? 0) > 1
      ? `-${crypto.createHash('sha1').update(source.xmlUrl).digest('hex').slice(0, 8)}`
      : '';
    names.set(source.xmlUrl, `${slug}${suffix}.${targetLang}.xml`);
  }
  return names;
};

const escapeHtml = (text: string) =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

const paragraphsToHtml = (text: string) =>
  text
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .map((paragraph) => `<p>${escapeHtml(paragraph).replace(/\n/g, '<br/>')}</p>`)
    .join('');

export const renderDescription = (entry: TranslatedEntry, options: RenderOptions) => {
  let html = paragraphsToHtml(entry.translatedText);
  if (entry.partiallyTranslated) {
    html += '<p><em>Parts of this article could not be translated and are shown in the original language.</em></p>';
  }
  const source = entry.sourceText.trim();
  if (options.includeOriginalSnippet && source) {
    const snippet = source.length > SNIPPET_CHARS ? `${source.slice(0, SNIPPET_CHARS)}...` : source;
    html += `<hr/><p><b>Original snippet:</b></p>${paragraphsToHtml(snippet)}`;
  }
  return html;
};

const toRfc822 = (iso: string) => moment.utc(iso).format('ddd, DD MMM YYYY HH:mm:ss [+0000]');

const toIso = (iso: string) => moment.utc(iso).toISOString();

const isValidDate = (iso: string | undefined): iso is string => Boolean(iso) && moment.utc(iso).isValid();

// Latest entry date, so unchanged input renders unchanged output.
const newestDate = (entries: TranslatedEntry[]) => {
  let newest: moment.Moment | undefined;
  for (const entry of entries) {
    if (!isValidDate(entry.publishedAt)) continue;
    const date = moment.utc(entry.publishedAt);
    if (!newest || date.isAfter(newest)) newest = date;
  }
  return newest?.toISOString();
};

const entryTitle = (feed: TranslatedFeed, entry: TranslatedEntry) => `[${feed.targetLang.toUpperCase()}] ${entry.title}`;

const feedTitle = (feed: TranslatedFeed) => `${feed.title} (Translated → ${feed.targetLang})`;

const buildRss = (feed: TranslatedFeed, entries: TranslatedEntry[], options: RenderOptions) => {
  const newest = newestDate(entries);
  return {
    rss: {
      '@_version': '2.0',
      channel: {
        title: feedTitle(feed),
        link: feed.link,
        description: feed.description || feedTitle(feed),
        language: feed.targetLang,
        generator: GENERATOR,
        ...(newest ? { lastBuildDate: toRfc822(newest) } : {}),
        item: entries.map((entry) => ({
          title: entryTitle(feed, entry),
          link: entry.link,
          guid: { '#text': entry.guid, '@_isPermaLink': 'false' },
          ...(isValidDate(entry.publishedAt) ? { pubDate: toRfc822(entry.publishedAt) } : {}),
          description: renderDescription(entry, options),
        })),
      },
    },
  };
};

const buildAtom = (feed: TranslatedFeed, entries: TranslatedEntry[], options: RenderOptions) => {
  const updated = newestDate(entries) ?? EPOCH;
  return {
    feed: {
      '@_xmlns': 'http://www.w3.org/2005/Atom',
      '@_xml:lang': feed.targetLang,
      title: feedTitle(feed),
      id: feed.feedId,
      link: { '@_href': feed.link, '@_rel': 'alternate' },
      updated,
      generator: GENERATOR,
      entry: entries.map((entry) => {
        const date = isValidDate(entry.publishedAt) ? toIso(entry.publishedAt) : undefined;
        return {
          title: entryTitle(feed, entry),
          id: entry.guid,
          link: { '@_href': entry.link, '@_rel': 'alternate' },
          updated: date ?? updated,
          ...(date ? { published: date } : {}),
          summary: { '#text': renderDescription(entry, options), '@_type': 'html' },
        };
      }),
    },
  };
};

/** Serializes the feed in the format of its source, entries in original order. */
export const renderFeed = (feed: TranslatedFeed, options: RenderOptions) => {
  const entries = [...feed.entries].sort((a, b) => a.index - b.index);
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });
  const document = feed.format === 'atom' ? buildAtom(feed, entries, options) : buildRss(feed, entries, options);
  return `${XML_DECLARATION}\n${builder.build(document)}`;
};

export const writeFeed = async (feed: TranslatedFeed, options: RenderOptions) => {
  await fs.promises.mkdir(path.dirname(feed.outputPath), { recursive: true });
  await fs.promises.writeFile(feed.outputPath, renderFeed(feed, options), 'utf-8');
  return feed.outputPath;
};
