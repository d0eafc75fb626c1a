import fsSync from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  JsonFileTranslationCache,
  NoopTranslationCache,
  contentHashFor,
  fingerprintFor,
  openTranslationCache,
  type CacheWrite,
} from './cache';
import { CacheUnavailable } from './errors';

const dirs: string[] = [];

const makeCachePath = async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rss-translate-cache-'));
  dirs.push(dir);
  return { dir, cachePath: path.join(dir, 'cache.json') };
};

const fixedNow = () => new Date('2025-01-06T12:00:00.000Z');

const write = (overrides: Partial<CacheWrite> = {}): CacheWrite => ({
  fingerprint: fingerprintFor('https://diario.example/rss', 'g-1'),
  targetLang: 'en',
  translatedText: 'Hello',
  translatedTitle: 'Title',
  contentHash: contentHashFor('Título', 'Hola'),
  provider: 'openai',
  ...overrides,
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(dirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe('fingerprintFor / contentHashFor', () => {
  it('hashes article identity per feed', () => {
    const fingerprint = fingerprintFor('https://a.example/rss', 'g-1');
    expect(fingerprint).toMatch(/^[0-9a-f]{40}$/);
    expect(fingerprintFor('https://a.example/rss', 'g-1')).toBe(fingerprint);
    expect(fingerprintFor('https://b.example/rss', 'g-1')).not.toBe(fingerprint);
  });

  it('changes the content hash when the title or the text changes', () => {
    const hash = contentHashFor('Título', 'Hola');
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(contentHashFor('Otro título', 'Hola')).not.toBe(hash);
    expect(contentHashFor('Título', 'Adiós')).not.toBe(hash);
  });
});

describe('JsonFileTranslationCache', () => {
  it('starts empty when the file does not exist', async () => {
    const { cachePath } = await makeCachePath();
    const cache = await openTranslationCache(cachePath);
    expect(cache.size).toBe(0);
    expect(cache.lookup(write().fingerprint, 'en')).toBeUndefined();
  });

  it('persists entries across opens', async () => {
    const { cachePath } = await makeCachePath();
    const cache = await JsonFileTranslationCache.open(cachePath, { now: fixedNow });
    expect(await cache.store(write())).toBe('created');

    const reopened = await JsonFileTranslationCache.open(cachePath);
    expect(reopened.lookup(write().fingerprint, 'en')).toEqual({
      ...write(),
      createdAt: '2025-01-06T12:00:00.000Z',
    });
    expect(reopened.lookup(write().fingerprint, 'es')).toBeUndefined();
  });

  it('keeps a matching entry and replaces a stale one', async () => {
    const { cachePath } = await makeCachePath();
    const cache = await JsonFileTranslationCache.open(cachePath);
    await cache.store(write());

    expect(await cache.store(write({ translatedText: 'Hi' }))).toBe('unchanged');
    expect(cache.lookup(write().fingerprint, 'en')?.translatedText).toBe('Hello');

    const changed = contentHashFor('Título', 'Hola de nuevo');
    expect(await cache.store(write({ translatedText: 'Hello again', contentHash: changed }))).toBe('replaced');
    expect(cache.size).toBe(1);
    expect(cache.lookup(write().fingerprint, 'en')?.translatedText).toBe('Hello again');
  });

  it('serializes concurrent writes and leaves no temp files', async () => {
    const { dir, cachePath } = await makeCachePath();
    const cache = await JsonFileTranslationCache.open(cachePath);
    await Promise.all(
      ['g-1', 'g-2', 'g-3', 'g-4', 'g-5'].map((guid) =>
        cache.store(write({ fingerprint: fingerprintFor('https://diario.example/rss', guid) })),
      ),
    );

    const reopened = await JsonFileTranslationCache.open(cachePath);
    expect(reopened.size).toBe(5);
    expect(await fs.readdir(dir)).toEqual(['cache.json']);
  });

  it('writes the document once for stores queued together', async () => {
    const { cachePath } = await makeCachePath();
    const cache = await JsonFileTranslationCache.open(cachePath);
    const rename = vi.spyOn(fsSync.promises, 'rename');

    await Promise.all(
      Array.from({ length: 20 }, (_, index) =>
        cache.store(write({ fingerprint: fingerprintFor('https://diario.example/rss', `g-${index}`) })),
      ),
    );
    expect(rename).toHaveBeenCalledTimes(1);

    await cache.store(write({ fingerprint: fingerprintFor('https://diario.example/rss', 'g-late') }));
    expect(rename).toHaveBeenCalledTimes(2);

    const reopened = await JsonFileTranslationCache.open(cachePath);
    expect(reopened.size).toBe(21);
  });

  it('rejects a corrupt file', async () => {
    const { cachePath } = await makeCachePath();
    await fs.writeFile(cachePath, '{ not json', 'utf-8');
    await expect(JsonFileTranslationCache.open(cachePath)).rejects.toBeInstanceOf(CacheUnavailable);
  });

  it('rejects an unknown layout', async () => {
    const { cachePath } = await makeCachePath();
    await fs.writeFile(cachePath, JSON.stringify({ version: 2, entries: {} }), 'utf-8');
    await expect(JsonFileTranslationCache.open(cachePath)).rejects.toThrow(/unknown layout/);
  });

  it('skips malformed entries', async () => {
    const { cachePath } = await makeCachePath();
    const good = { ...write(), createdAt: '2025-01-06T12:00:00.000Z' };
    await fs.writeFile(
      cachePath,
      JSON.stringify({ version: 1, entries: { a: good, b: { fingerprint: 'x' }, c: 'nope' } }),
      'utf-8',
    );
    const cache = await JsonFileTranslationCache.open(cachePath);
    expect(cache.size).toBe(1);
    expect(cache.lookup(good.fingerprint, 'en')).toEqual(good);
  });

  it('reports a failed write as CacheUnavailable', async () => {
    const { dir } = await makeCachePath();
    const cachePath = path.join(dir, 'sub', 'cache.json');
    const cache = await JsonFileTranslationCache.open(cachePath);
    // a file where the directory should be
    await fs.writeFile(path.join(dir, 'sub'), 'blocked', 'utf-8');

    await expect(cache.store(write())).rejects.toBeInstanceOf(CacheUnavailable);
  });
});

describe('NoopTranslationCache', () => {
  it('always misses and ignores stores', async () => {
    const cache = new NoopTranslationCache();
    expect(await cache.store(write())).toBe('disabled');
    expect(cache.lookup(write().fingerprint, 'en')).toBeUndefined();
  });
});
