import path from 'node:path';
import pLimit from 'p-limit';
import { NoopTranslationCache, contentHashFor, fingerprintFor, type TranslationCache } from './cache';
import type { RunConfig } from './config';
import { CacheUnavailable, FatalRunError, FetchError, TranslationError, errorMessage } from './errors';
import { resolveSourceText, type SourceText } from './extractor';
import { fetchFeed } from './feeds';
import type { Logger } from './logger';
import type { RepublishedFeed } from './opml';
import { executePlan, planTranslation, translateWithRetry, type ExecuteOptions } from './policy';
import type { TranslationProvider } from './providers';
import type {
  ArticleOutcome,
  ArticleRecord,
  FeedEntry,
  FeedRunStats,
  FeedSource,
  FetchedFeed,
  RunSummary,
  TranslatedEntry,
  TranslatedFeed,
} from './types';
import { assignFileNames, writeFeed } from './writer';

export const EXIT_OK = 0;
export const EXIT_FEED_FAILED = 1;
export const EXIT_DEGRADED = 2;
export const EXIT_FATAL = 3;

export type PipelineDeps = {
  config: RunConfig;
  provider: TranslationProvider;
  cache: TranslationCache;
  log: Logger;
  // set when the cache could not be opened and `cache` is a stand-in
  cacheDegraded?: boolean;
  fetchFeed?: (source: FeedSource) => Promise<FetchedFeed>;
  resolveSourceText?: (entry: FeedEntry) => Promise<SourceText>;
  writeFeed?: (feed: TranslatedFeed) => Promise<string>;
  sleep?: (ms: number) => Promise<void>;
};

export type PipelineResult = {
  summary: RunSummary;
  published: Map<string, RepublishedFeed>;
};

type ArticleResult =
  | {
      outcome: 'translated' | 'cached' | 'partial';
      title: string;
      text: string;
      sourceText: string;
      partiallyTranslated: boolean;
    }
  | { outcome: 'skipped'; reason: string }
  | { outcome: 'failed'; reason: string };

type Translation = Extract<ArticleResult, { title: string }>;

const emptyStats = (source: FeedSource): FeedRunStats => ({
  feedId: source.xmlUrl,
  title: source.title,
  status: 'ok',
  translated: 0,
  cached: 0,
  partial: 0,
  skipped: 0,
  failed: 0,
});

export const computeExitCode = (feeds: FeedRunStats[], cacheDegraded: boolean) => {
  if (feeds.some((feed) => feed.status === 'failed')) return EXIT_FEED_FAILED;
  const degraded = feeds.some((feed) => feed.partial + feed.skipped + feed.failed > 0);
  return degraded || cacheDegraded ? EXIT_DEGRADED : EXIT_OK;
};

/**
 * Translates every feed and writes one XML file per feed.
 *
 * Feed fetches and article tasks share one bounded pool. Work for a given
 * (fingerprint, language) runs at most once per run; a second task for the
 * same key reuses the first one's result. Output keeps each feed's entry
 * order. Throws FatalRunError when the provider rejects the credentials.
 */
export const runPipeline = async (sources: FeedSource[], deps: PipelineDeps): Promise<PipelineResult> => {
  const { config, provider, log } = deps;
  const limit = pLimit(config.concurrency);
  const inFlight = new Map<string, Promise<ArticleResult>>();
  const fileNames = assignFileNames(sources, config.targetLang);
  let cache = deps.cache;
  let cacheDegraded = deps.cacheDegraded ?? false;
  let fatal: FatalRunError | undefined;

  const loadFeed = deps.fetchFeed
    ?? ((source: FeedSource) =>
      fetchFeed(source, {
        maxItems: config.maxItemsPerFeed,
        maxAgeHours: config.maxAgeHours,
        timeoutMs: config.httpTimeoutMs,
      }));
  const loadSourceText = deps.resolveSourceText
    ?? ((entry: FeedEntry) =>
      resolveSourceText(entry, {
        fetchFullText: config.fetchFullText,
        minArticleChars: config.minArticleChars,
        timeoutMs: config.httpTimeoutMs,
        log: log.child('extract'),
      }));
  const saveFeed = deps.writeFeed
    ?? ((feed: TranslatedFeed) => writeFeed(feed, { includeOriginalSnippet: config.includeOriginalSnippet }));

  const executeOptions: ExecuteOptions = {
    ...config.policy,
    targetLang: config.targetLang,
    sourceLang: config.sourceLang,
    sleep: deps.sleep,
    log: log.child('policy'),
  };

  const storeTranslation = async (fingerprint: string, contentHash: string, result: Translation) => {
    try {
      await cache.store({
        fingerprint,
        targetLang: config.targetLang,
        translatedText: result.text,
        translatedTitle: result.title,
        contentHash,
        provider: provider.name,
      });
    } catch (error) {
      if (!(error instanceof CacheUnavailable)) throw error;
      log.warn(`${error.message}; continuing without the cache`);
      cache = new NoopTranslationCache();
      cacheDegraded = true;
    }
  };

  // Maps a plan-stopping failure to the article's outcome; auth ends the run.
  const stopOn = (error: TranslationError): ArticleResult => {
    if (error.kind === 'auth') {
      throw new FatalRunError(`Translation provider ${provider.name} rejected the credentials: ${error.message}`, {
        cause: error,
      });
    }
    return { outcome: 'skipped', reason: `${error.kind}: ${error.message}` };
  };

  const translateArticle = async (record: ArticleRecord, fingerprint: string): Promise<ArticleResult> => {
    const contentHash = contentHashFor(record.title, record.sourceText);
    const cached = cache.lookup(fingerprint, config.targetLang);
    if (cached && cached.contentHash === contentHash) {
      return {
        outcome: 'cached',
        title: cached.translatedTitle,
        text: cached.translatedText,
        sourceText: record.sourceText,
        partiallyTranslated: false,
      };
    }
    if (cached) log.debug(`content changed for ${record.guidOrLink}, translating again`);

    const plan = planTranslation(record.sourceText, config.policy);
    log.debug(`${plan.kind} plan (${plan.chunks.length} chunks) for ${record.guidOrLink}`);
    const body = await executePlan(plan, provider, executeOptions);
    if (!body.ok) return stopOn(body.error);

    let title = record.title;
    let titlePartial = false;
    if (record.title.trim()) {
      const translatedTitle = await translateWithRetry(provider, record.title, executeOptions);
      if (translatedTitle.ok) {
        title = translatedTitle.value;
      } else if (translatedTitle.error.kind === 'auth' || translatedTitle.error.kind === 'unsupported_language') {
        return stopOn(translatedTitle.error);
      } else {
        titlePartial = true;
      }
    }

    const partiallyTranslated = body.value.partiallyTranslated || titlePartial;
    const result: Translation = {
      outcome: partiallyTranslated ? 'partial' : 'translated',
      title,
      text: body.value.text,
      sourceText: record.sourceText,
      partiallyTranslated,
    };
    // degraded results are not kept, so the next run tries them again
    if (!partiallyTranslated) await storeTranslation(fingerprint, contentHash, result);
    return result;
  };

  const processArticle = async (source: FeedSource, entry: FeedEntry): Promise<ArticleResult> => {
    const guidOrLink = entry.guid || entry.link;
    const fingerprint = fingerprintFor(source.xmlUrl, guidOrLink);
    const key = `${fingerprint}:${config.targetLang}`;
    const pending = inFlight.get(key);
    if (pending) return pending;

    const task = (async () => {
      const text = await loadSourceText(entry);
      const record: ArticleRecord = {
        feedId: source.xmlUrl,
        guidOrLink,
        title: entry.title,
        publishedAt: entry.publishedAt,
        sourceText: text.text,
        sourceLang: config.sourceLang,
      };
      return translateArticle(record, fingerprint);
    })();
    inFlight.set(key, task);
    return task;
  };

  const runArticleTask = async (source: FeedSource, entry: FeedEntry, feedLog: Logger): Promise<ArticleResult> => {
    if (fatal) throw fatal;
    try {
      return await processArticle(source, entry);
    } catch (error) {
      if (error instanceof FatalRunError) {
        fatal = error;
        limit.clearQueue();
        throw error;
      }
      feedLog.error(`failed to translate ${entry.link || entry.guid}`, error);
      return { outcome: 'failed', reason: errorMessage(error) };
    }
  };

  const processFeed = async (source: FeedSource): Promise<FeedRunStats> => {
    const stats = emptyStats(source);
    const feedLog = log.child('feed');
    const fileName = fileNames.get(source.xmlUrl) ?? `feed.${config.targetLang}.xml`;
    feedLog.info(`==> ${source.title} :: ${source.xmlUrl}`);

    let fetched: FetchedFeed;
    try {
      fetched = await limit(() => {
        if (fatal) throw fatal;
        return loadFeed(source);
      });
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      feedLog.warn(`skipping ${source.xmlUrl}: ${error.message}`);
      return { ...stats, status: 'failed', error: error.message };
    }

    const results = await Promise.all(
      fetched.entries.map((entry) => limit(() => runArticleTask(source, entry, feedLog))),
    );

    const entries: TranslatedEntry[] = [];
    results.forEach((result, index) => {
      const outcome: ArticleOutcome = result.outcome;
      stats[outcome] += 1;
      if (result.outcome === 'skipped' || result.outcome === 'failed') {
        feedLog.warn(`${result.outcome} entry ${index}: ${result.reason}`);
        return;
      }
      const entry = fetched.entries[index];
      if (!entry) return;
      entries.push({
        index,
        guid: entry.guid,
        link: entry.link,
        title: result.title,
        publishedAt: entry.publishedAt,
        translatedText: result.text,
        sourceText: result.sourceText,
        partiallyTranslated: result.partiallyTranslated,
      });
    });

    if (results.length > 0 && stats.failed === results.length) {
      return { ...stats, status: 'failed', error: 'every entry failed' };
    }

    const outputPath = path.join(config.outputDir, fileName);
    try {
      await saveFeed({
        feedId: source.xmlUrl,
        fileName,
        outputPath,
        format: fetched.format,
        targetLang: config.targetLang,
        title: fetched.title,
        link: fetched.link,
        description: fetched.description,
        entries,
      });
    } catch (error) {
      feedLog.error(`cannot write ${outputPath}`, error);
      return { ...stats, status: 'failed', error: `write failed: ${errorMessage(error)}` };
    }
    feedLog.info(`saved ${outputPath} (items: ${entries.length})`);
    return { ...stats, fileName };
  };

  const feeds = await Promise.all(sources.map(processFeed));

  const published = new Map<string, RepublishedFeed>();
  for (const feed of feeds) {
    if (feed.status === 'ok' && feed.fileName) published.set(feed.feedId, { fileName: feed.fileName });
  }

  return {
    summary: { feeds, cacheDegraded, exitCode: computeExitCode(feeds, cacheDegraded) },
    published,
  };
};
