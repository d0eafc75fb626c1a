import { Readability } from '@mozilla/readability';
import { convert } from 'html-to-text';
import { JSDOM } from 'jsdom';
import fetch from 'node-fetch';
import { USER_AGENT } from './config';
import { ExtractionError, errorMessage } from './errors';
import type { Logger } from './logger';
import type { FetchLike } from './providers';
import type { FeedEntry } from './types';

export type ExtractOptions = {
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export type SourceTextOptions = ExtractOptions & {
  fetchFullText: boolean;
  minArticleChars: number;
  log?: Logger;
};

export type SourceText = {
  text: string;
  origin: 'article' | 'summary';
};

const headingOptions = { uppercase: false, leadingLineBreaks: 2, trailingLineBreaks: 2 };

/** Plain text with one blank line between paragraphs. */
export const htmlToText = (html: string) =>
  convert(html, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
      { selector: 'h1', options: headingOptions },
      { selector: 'h2', options: headingOptions },
      { selector: 'h3', options: headingOptions },
    ],
  })
    .replace(/\n{3,}/g, '\n\n')
    .trim();

export const extractReadableText = (html: string, url: string) => {
  const dom = new JSDOM(html, { url });
  try {
    const article = new Readability(dom.window.document).parse();
    return article?.content ? htmlToText(article.content) : '';
  } finally {
    dom.window.close();
  }
};

export const extractArticleText = async (url: string, options: ExtractOptions): Promise<string> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  let html: string;
  try {
    const response = await fetchImpl(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
      },
      timeout: options.timeoutMs,
    });
    if (!response.ok) throw new ExtractionError(url, `Article responded with HTTP ${response.status}`);
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('html') && !contentType.includes('xml')) {
      throw new ExtractionError(url, `Article is not HTML (${contentType || 'no content type'})`);
    }
    html = await response.text();
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(url, `Article unreachable: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return extractReadableText(html, url);
  } catch (error) {
    throw new ExtractionError(url, `Readability failed: ${errorMessage(error)}`, { cause: error });
  }
};

/**
 * Picks the text to translate for one entry: the readable article body when it
 * can be fetched and is long enough, the feed-supplied summary otherwise.
 */
export const resolveSourceText = async (entry: FeedEntry, options: SourceTextOptions): Promise<SourceText> => {
  const summary: SourceText = { text: htmlToText(entry.summary), origin: 'summary' };
  if (!options.fetchFullText || !entry.link) return summary;

  try {
    const text = await extractArticleText(entry.link, options);
    if (text.length >= options.minArticleChars) return { text, origin: 'article' };
    options.log?.debug(`extracted ${text.length} chars from ${entry.link}, using feed summary`);
  } catch (error) {
    if (!(error instanceof ExtractionError)) throw error;
    options.log?.debug(`extraction failed, using feed summary: ${error.message}`);
  }
  return summary;
};
