import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel, PolicyOptions, ProviderName } from './types';

export const USER_AGENT = 'rss-translate/1.0 (+Feedly OPML pipeline)';

export const PROVIDER_NAMES = ['openai', 'deepl', 'google'] as const;
// Add a language here to publish another edition; providers map the code themselves.
export const SUPPORTED_TARGET_LANGS = ['en', 'es'] as const;
export type TargetLanguage = (typeof SUPPORTED_TARGET_LANGS)[number];

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const lowercase = (value: string) => value.trim().toLowerCase();

const flag = (fallback: boolean) =>
  z
    .string()
    .default(fallback ? 'true' : 'false')
    .transform(lowercase)
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TRANSLATOR: z.string().default('openai').transform(lowercase).pipe(z.enum(PROVIDER_NAMES)),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4.1-mini'),
  DEEPL_API_KEY: z.string().optional(),
  GOOGLE_TRANSLATE_API_KEY: z.string().optional(),
  TRANSLATE_TARGET_LANG: z.string().default('en').transform(lowercase).pipe(z.enum(SUPPORTED_TARGET_LANGS)),
  TRANSLATE_SOURCE_LANG: z.string().transform(lowercase).optional(),
  OPML_PATH: z.string().optional(),
  FEED_URLS: z.string().optional(),
  FEED_URL_FILTER: z.string().optional(),
  OUTPUT_DIR: z.string().default('output/feeds'),
  OPML_OUT: z.string().default('output/opml/translated.opml'),
  CACHE_PATH: z.string().default('output/cache.json'),
  PUBLIC_BASE_URL: z.string().url().optional(),
  COLLECTION_NAME: z.string().default('Translated Feeds'),
  HTTP_TIMEOUT: z.coerce.number().positive().default(20),
  MAX_ITEMS_PER_FEED: positiveInt(30),
  MAX_AGE_HOURS: z.coerce.number().nonnegative().default(0),
  MIN_ARTICLE_CHARS: z.coerce.number().int().nonnegative().default(400),
  CHUNK_SIZE: positiveInt(4000),
  SUMMARIZE_MULTIPLIER: positiveInt(4),
  SPLIT_LOOKBACK: z.coerce.number().int().nonnegative().default(400),
  SUMMARY_MAX_CHARS: z.coerce.number().int().positive().optional(),
  RETRY_COUNT: z.coerce.number().int().nonnegative().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  TRANSLATE_TIMEOUT_MS: positiveInt(60000),
  CONCURRENCY: positiveInt(4),
  FETCH_FULL_TEXT: flag(true),
  INCLUDE_ORIGINAL_SNIPPET: flag(true),
  LOG_LEVEL: z.string().default('info').transform(lowercase).pipe(z.enum(LOG_LEVELS)),
  SLACK_WEBHOOK_URL: z.string().url().optional(),
});

export type RunConfig = {
  translator: ProviderName;
  credentials: {
    openaiApiKey?: string;
    deeplApiKey?: string;
    googleApiKey?: string;
  };
  openaiModel: string;
  targetLang: TargetLanguage;
  sourceLang?: string;
  opmlPath?: string;
  feedUrls: string[];
  feedUrlFilter?: string;
  outputDir: string;
  opmlOut: string;
  cachePath: string;
  publicBaseUrl?: string;
  collectionName: string;
  httpTimeoutMs: number;
  maxItemsPerFeed: number;
  maxAgeHours: number;
  minArticleChars: number;
  policy: PolicyOptions;
  concurrency: number;
  fetchFullText: boolean;
  includeOriginalSnippet: boolean;
  logLevel: LogLevel;
  slackWebhookUrl?: string;
};

export type ConfigSource = Record<string, string | undefined>;

// Blank values in .env files mean "unset", not "empty string".
const dropBlank = (source: ConfigSource): ConfigSource => {
  const out: ConfigSource = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
};

const CREDENTIAL_VARS: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  deepl: 'DEEPL_API_KEY',
  google: 'GOOGLE_TRANSLATE_API_KEY',
};

/**
 * Builds the run configuration from the environment, with `overrides`
 * (CLI flags, keyed by variable name) taking precedence.
 * Throws ConfigError before anything touches the network.
 */
export const loadConfig = (env: ConfigSource, overrides: ConfigSource = {}): RunConfig => {
  const parsed = envSchema.safeParse({ ...dropBlank(env), ...dropBlank(overrides) });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`);
  }
  const values = parsed.data;

  const credentials = {
    openaiApiKey: values.OPENAI_API_KEY,
    deeplApiKey: values.DEEPL_API_KEY,
    googleApiKey: values.GOOGLE_TRANSLATE_API_KEY,
  };
  const selectedKey = {
    openai: credentials.openaiApiKey,
    deepl: credentials.deeplApiKey,
    google: credentials.googleApiKey,
  }[values.TRANSLATOR];
  if (!selectedKey) {
    throw new ConfigError(
      `Missing ${CREDENTIAL_VARS[values.TRANSLATOR]} for TRANSLATOR=${values.TRANSLATOR}. Set it in .env or the environment.`,
    );
  }

  const feedUrls = (values.FEED_URLS ?? '')
    .split(',')
    .map((url) => url.trim())
    .filter(Boolean);
  if (!values.OPML_PATH && feedUrls.length === 0) {
    throw new ConfigError('No feeds configured: pass --opml, or set OPML_PATH or FEED_URLS.');
  }

  return {
    translator: values.TRANSLATOR,
    credentials,
    openaiModel: values.OPENAI_MODEL,
    targetLang: values.TRANSLATE_TARGET_LANG,
    sourceLang: values.TRANSLATE_SOURCE_LANG,
    opmlPath: values.OPML_PATH,
    feedUrls,
    feedUrlFilter: values.FEED_URL_FILTER,
    outputDir: values.OUTPUT_DIR,
    opmlOut: values.OPML_OUT,
    cachePath: values.CACHE_PATH,
    publicBaseUrl: values.PUBLIC_BASE_URL,
    collectionName: values.COLLECTION_NAME,
    httpTimeoutMs: Math.round(values.HTTP_TIMEOUT * 1000),
    maxItemsPerFeed: values.MAX_ITEMS_PER_FEED,
    maxAgeHours: values.MAX_AGE_HOURS,
    minArticleChars: values.MIN_ARTICLE_CHARS,
    policy: {
      chunkSize: values.CHUNK_SIZE,
      summarizeMultiplier: values.SUMMARIZE_MULTIPLIER,
      splitLookback: values.SPLIT_LOOKBACK,
      summaryMaxChars: values.SUMMARY_MAX_CHARS ?? values.CHUNK_SIZE,
      retryCount: values.RETRY_COUNT,
      retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
      translateTimeoutMs: values.TRANSLATE_TIMEOUT_MS,
    },
    concurrency: values.CONCURRENCY,
    fetchFullText: values.FETCH_FULL_TEXT,
    includeOriginalSnippet: values.INCLUDE_ORIGINAL_SNIPPET,
    logLevel: values.LOG_LEVEL,
    slackWebhookUrl: values.SLACK_WEBHOOK_URL,
  };
};
