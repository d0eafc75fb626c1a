import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { CacheUnavailable, errorMessage } from './errors';
import type { CacheEntry, ProviderName } from './types';

const CACHE_VERSION = 1;

export type CacheWrite = Omit<CacheEntry, 'createdAt'>;

export type StoreOutcome = 'created' | 'replaced' | 'unchanged' | 'disabled';

export interface TranslationCache {
  lookup(fingerprint: string, targetLang: string): CacheEntry | undefined;
  store(write: CacheWrite): Promise<StoreOutcome>;
}

export const fingerprintFor = (feedId: string, guidOrLink: string) =>
  crypto.createHash('sha1').update(`${feedId}\n${guidOrLink}`, 'utf8').digest('hex');

// The title is hashed with the text: the entry carries a translated title too.
export const contentHashFor = (title: string, text: string) =>
  crypto.createHash('sha256').update(`${title}\n\n${text}`, 'utf8').digest('hex');

const entryKey = (fingerprint: string, targetLang: string) => `${fingerprint}:${targetLang}`;

type JsonRecord = Record<string, unknown>;

const isJsonRecord = (value: unknown): value is JsonRecord =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const PROVIDERS: readonly ProviderName[] = ['openai', 'deepl', 'google'];

const isProviderName = (value: unknown): value is ProviderName =>
  typeof value === 'string' && PROVIDERS.some((name) => name === value);

const toCacheEntry = (raw: unknown): CacheEntry | null => {
  if (!isJsonRecord(raw)) return null;
  const { fingerprint, targetLang, translatedText, translatedTitle, contentHash, createdAt, provider } = raw;
  if (
    typeof fingerprint !== 'string'
    || typeof targetLang !== 'string'
    || typeof translatedText !== 'string'
    || typeof translatedTitle !== 'string'
    || typeof contentHash !== 'string'
    || typeof createdAt !== 'string'
    || !isProviderName(provider)
  ) {
    return null;
  }
  return { fingerprint, targetLang, translatedText, translatedTitle, contentHash, createdAt, provider };
};

const readCacheFile = async (filePath: string): Promise<Map<string, CacheEntry>> => {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isJsonRecord(err) && err.code === 'ENOENT') return new Map();
    throw new CacheUnavailable(`Cannot read translation cache at ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CacheUnavailable(`Translation cache at ${filePath} is corrupt: ${errorMessage(err)}`, { cause: err });
  }
  if (!isJsonRecord(parsed) || parsed.version !== CACHE_VERSION || !isJsonRecord(parsed.entries)) {
    throw new CacheUnavailable(`Translation cache at ${filePath} has an unknown layout`);
  }

  const entries = new Map<string, CacheEntry>();
  for (const value of Object.values(parsed.entries)) {
    const entry = toCacheEntry(value);
    if (entry) entries.set(entryKey(entry.fingerprint, entry.targetLang), entry);
  }
  return entries;
};

const writeJsonFileAtomic = async (filePath: string, payload: JsonRecord) => {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
  await fs.promises.writeFile(tmp, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  await fs.promises.rename(tmp, filePath);
};

/**
 * Durable cache of finished translations, one JSON document on disk.
 *
 * Lookups are served from memory. Changes are flushed by rewriting the
 * document through a temp file and a rename, one flush at a time, so a crash
 * leaves either the previous or the next complete document. Stores that arrive
 * while a flush is queued share it.
 */
export class JsonFileTranslationCache implements TranslationCache {
  private lastFlush: Promise<void> = Promise.resolve();
  private queuedFlush: Promise<void> | undefined;

  private constructor(
    private readonly filePath: string,
    private readonly entries: Map<string, CacheEntry>,
    private readonly now: () => Date,
  ) {}

  static async open(filePath: string, options: { now?: () => Date } = {}) {
    const resolved = path.resolve(filePath);
    const entries = await readCacheFile(resolved);
    return new JsonFileTranslationCache(resolved, entries, options.now ?? (() => new Date()));
  }

  get size() {
    return this.entries.size;
  }

  lookup(fingerprint: string, targetLang: string): CacheEntry | undefined {
    return this.entries.get(entryKey(fingerprint, targetLang));
  }

  async store(write: CacheWrite): Promise<StoreOutcome> {
    const key = entryKey(write.fingerprint, write.targetLang);
    const existing = this.entries.get(key);
    if (existing && existing.contentHash === write.contentHash) return 'unchanged';

    this.entries.set(key, { ...write, createdAt: this.now().toISOString() });
    await this.flush();
    return existing ? 'replaced' : 'created';
  }

  private flush(): Promise<void> {
    const queued = this.queuedFlush ?? this.queueFlush();
    return queued.catch((err: unknown) => {
      throw new CacheUnavailable(`Cannot write translation cache at ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    });
  }

  private queueFlush(): Promise<void> {
    const queued = this.lastFlush.then(() => {
      // entries set after this point need the next flush
      this.queuedFlush = undefined;
      return writeJsonFileAtomic(this.filePath, {
        version: CACHE_VERSION,
        entries: Object.fromEntries(this.entries),
      });
    });
    this.queuedFlush = queued;
    // The chain only orders flushes; each caller gets the failure in flush().
    this.lastFlush = queued.catch(() => undefined);
    return queued;
  }
}

export const openTranslationCache = (filePath: string, options: { now?: () => Date } = {}) =>
  JsonFileTranslationCache.open(filePath, options);

/** Stand-in used when the cache file cannot be opened or written: always misses. */
export class NoopTranslationCache implements TranslationCache {
  lookup(_fingerprint: string, _targetLang: string): CacheEntry | undefined {
    return undefined;
  }

  async store(_write: CacheWrite): Promise<StoreOutcome> {
    return 'disabled';
  }
}
