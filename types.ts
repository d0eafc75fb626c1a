export type ProviderName = 'openai' | 'deepl' | 'google';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type FeedSource = {
  title: string;
  xmlUrl: string;
  htmlUrl?: string;
};

export type FeedFormat = 'rss' | 'atom';

export type FeedEntry = {
  guid: string;
  link: string;
  title: string;
  // HTML or plain text as supplied by the feed
  summary: string;
  publishedAt?: string;
};

export type FetchedFeed = {
  source: FeedSource;
  format: FeedFormat;
  title: string;
  link: string;
  description: string;
  entries: FeedEntry[];
};

export type ArticleRecord = {
  feedId: string;
  guidOrLink: string;
  title: string;
  publishedAt?: string;
  sourceText: string;
  sourceLang?: string;
};

export type CacheEntry = {
  fingerprint: string;
  targetLang: string;
  translatedText: string;
  translatedTitle: string;
  contentHash: string;
  createdAt: string;
  provider: ProviderName;
};

export type PlanKind = 'whole' | 'chunked' | 'summarized';

export type TextSpan = {
  text: string;
  // inserted after the span when chunks are put back together
  joiner: string;
};

export type TranslationPlan = {
  kind: PlanKind;
  chunks: TextSpan[];
};

export type PolicyOptions = {
  chunkSize: number;
  summarizeMultiplier: number;
  splitLookback: number;
  summaryMaxChars: number;
  retryCount: number;
  retryBaseDelayMs: number;
  translateTimeoutMs: number;
};

export type ArticleOutcome = 'translated' | 'cached' | 'partial' | 'skipped' | 'failed';

export type TranslatedEntry = {
  index: number;
  guid: string;
  link: string;
  title: string;
  publishedAt?: string;
  translatedText: string;
  sourceText: string;
  partiallyTranslated: boolean;
};

export type TranslatedFeed = {
  feedId: string;
  fileName: string;
  outputPath: string;
  format: FeedFormat;
  targetLang: string;
  title: string;
  link: string;
  description: string;
  entries: TranslatedEntry[];
};

export type FeedRunStats = {
  feedId: string;
  title: string;
  status: 'ok' | 'failed';
  fileName?: string;
  error?: string;
  translated: number;
  cached: number;
  partial: number;
  skipped: number;
  failed: number;
};

export type RunSummary = {
  feeds: FeedRunStats[];
  cacheDegraded: boolean;
  exitCode: number;
};
