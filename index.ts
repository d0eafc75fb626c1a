#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { NoopTranslationCache, openTranslationCache, type TranslationCache } from './cache';
import { loadConfig, PROVIDER_NAMES, type ConfigSource, type RunConfig } from './config';
import { CacheUnavailable, ConfigError, FatalRunError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import {
  collectFeedSources,
  feedListDocument,
  parseOpml,
  rebuildOpml,
  type OpmlDocument,
  type RepublishedFeed,
} from './opml';
import { EXIT_FATAL, EXIT_FEED_FAILED, runPipeline, type PipelineDeps } from './pipeline';
import { createTranslationProvider, type TranslationProvider } from './providers';
import type { FeedSource, ProviderName } from './types';
import { constructSlackMessage, formatRunSummary, postToSlack } from './utils';

export type CliOptions = {
  opml?: string;
  outDir?: string;
  outOpml?: string;
  cache?: string;
  baseUrl?: string;
  collectionName?: string;
  filter?: string;
  translator?: string;
  targetLang?: string;
  apiKey?: string;
};

const API_KEY_VARS: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  deepl: 'DEEPL_API_KEY',
  google: 'GOOGLE_TRANSLATE_API_KEY',
};

export const buildProgram = () =>
  new Command()
    .name('rss-translate')
    .description('Translate the feeds of an OPML file and republish them as static XML')
    .option('--opml <path>', 'OPML file listing the source feeds (OPML_PATH)')
    .option('--out-dir <dir>', 'directory for the translated feeds (OUTPUT_DIR)')
    .option('--out-opml <path>', 'where to write the rebuilt OPML (OPML_OUT)')
    .option('--cache <path>', 'translation cache file (CACHE_PATH)')
    .option('--base-url <url>', 'public URL the feeds are served from (PUBLIC_BASE_URL)')
    .option('--collection-name <name>', 'root folder name in the rebuilt OPML (COLLECTION_NAME)')
    .option('--filter <text>', 'only feeds whose URL contains this text (FEED_URL_FILTER)')
    .option('--translator <name>', `${PROVIDER_NAMES.join(' | ')} (TRANSLATOR)`)
    .option('--target-lang <lang>', 'target language (TRANSLATE_TARGET_LANG)')
    .option('--api-key <key>', 'API key for the selected translator');

/** Flags win over the environment; `--api-key` fills the selected translator's key. */
export const toOverrides = (options: CliOptions, env: ConfigSource): ConfigSource => {
  const translator = (options.translator ?? env.TRANSLATOR ?? 'openai').trim().toLowerCase();
  const keyVar = PROVIDER_NAMES.find((name) => name === translator);
  return {
    OPML_PATH: options.opml,
    OUTPUT_DIR: options.outDir,
    OPML_OUT: options.outOpml,
    CACHE_PATH: options.cache,
    PUBLIC_BASE_URL: options.baseUrl,
    COLLECTION_NAME: options.collectionName,
    FEED_URL_FILTER: options.filter,
    TRANSLATOR: options.translator,
    TRANSLATE_TARGET_LANG: options.targetLang,
    ...(options.apiKey && keyVar ? { [API_KEY_VARS[keyVar]]: options.apiKey } : {}),
  };
};

export const loadFeedList = async (config: RunConfig): Promise<{ doc: OpmlDocument; sources: FeedSource[] }> => {
  let doc: OpmlDocument;
  if (config.opmlPath) {
    let text: string;
    try {
      text = await fs.promises.readFile(config.opmlPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read OPML file ${config.opmlPath}: ${errorMessage(error)}`);
    }
    doc = parseOpml(text);
  } else {
    doc = feedListDocument(config.feedUrls);
  }

  const sources = collectFeedSources(doc, config.feedUrlFilter);
  if (sources.length === 0) {
    const filter = config.feedUrlFilter ? ` matching "${config.feedUrlFilter}"` : '';
    throw new ConfigError(`No feeds${filter} found in ${config.opmlPath ?? 'FEED_URLS'}.`);
  }
  return { doc, sources };
};

const openCache = async (config: RunConfig, log: Logger): Promise<{ cache: TranslationCache; degraded: boolean }> => {
  try {
    const cache = await openTranslationCache(config.cachePath);
    log.debug(`cache ${config.cachePath}: ${cache.size} entries`);
    return { cache, degraded: false };
  } catch (error) {
    if (!(error instanceof CacheUnavailable)) throw error;
    log.warn(`${error.message}; running without the cache until ${config.cachePath} is repaired or deleted`);
    return { cache: new NoopTranslationCache(), degraded: true };
  }
};

const writeOpml = async (
  config: RunConfig,
  doc: OpmlDocument,
  published: ReadonlyMap<string, RepublishedFeed>,
  log: Logger,
) => {
  if (!config.publicBaseUrl) {
    log.info('PUBLIC_BASE_URL not set, skipping the OPML rebuild');
    return;
  }
  const { xml, missing } = rebuildOpml(doc, published, {
    collectionName: config.collectionName,
    publicBaseUrl: config.publicBaseUrl,
    targetLang: config.targetLang,
  });
  await fs.promises.mkdir(path.dirname(config.opmlOut), { recursive: true });
  await fs.promises.writeFile(config.opmlOut, xml, 'utf-8');
  log.info(`wrote ${config.opmlOut} (${published.size} feeds)`);
  if (missing > 0) log.warn(`${missing} feeds left out of the OPML: no translated output`);
};

export type MainDeps = {
  provider?: TranslationProvider;
  fetchFeed?: PipelineDeps['fetchFeed'];
  resolveSourceText?: PipelineDeps['resolveSourceText'];
  sleep?: PipelineDeps['sleep'];
};

/** One batch run; resolves to the process exit status. */
export const main = async (argv: string[], env: ConfigSource, deps: MainDeps = {}): Promise<number> => {
  const program = buildProgram();
  program.parse(argv);
  let log = createLogger('cli');

  try {
    const config = loadConfig(env, toOverrides(program.opts<CliOptions>(), env));
    log = createLogger('cli', config.logLevel);
    const provider = deps.provider ?? createTranslationProvider(config);
    const { doc, sources } = await loadFeedList(config);
    const { cache, degraded } = await openCache(config, log);
    log.info(`translating ${sources.length} feeds into ${config.targetLang} with ${provider.name}`);

    const { summary, published } = await runPipeline(sources, {
      config,
      provider,
      cache,
      cacheDegraded: degraded,
      log: log.child('run'),
      fetchFeed: deps.fetchFeed,
      resolveSourceText: deps.resolveSourceText,
      sleep: deps.sleep,
    });

    await writeOpml(config, doc, published, log);
    log.info(`run summary\n${formatRunSummary(summary)}`);
    if (config.slackWebhookUrl) await postToSlack(config.slackWebhookUrl, constructSlackMessage(summary), log);
    return summary.exitCode;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof FatalRunError) {
      log.error(error.message);
      return EXIT_FATAL;
    }
    log.error('run aborted', error);
    return EXIT_FEED_FAILED;
  }
};

if (require.main === module) {
  dotenv.config();
  main(process.argv, process.env).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FEED_FAILED;
    },
  );
}
