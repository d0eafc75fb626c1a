import * as deepl from 'deepl-node';
import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import OpenAI from 'openai';
import type { RunConfig } from './config';
import { ConfigError, TranslationError, errorMessage, fail, ok, type Result } from './errors';
import { clipText, truncateHeadTail } from './policy';
import type { ProviderName } from './types';

export interface TranslationProvider {
  readonly name: ProviderName;
  translate(text: string, sourceLang: string | undefined, targetLang: string): Promise<Result<string>>;
  summarize(text: string, maxLen: number): Promise<Result<string>>;
}

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  es: 'Spanish',
  de: 'German',
  fr: 'French',
  it: 'Italian',
  pt: 'Portuguese',
  ru: 'Russian',
  zh: 'Chinese',
  ja: 'Japanese',
};

const languageName = (code: string) => LANGUAGE_NAMES[code] ?? code;

// Providers never see more than this when asked for a summary.
const SUMMARY_INPUT_MAX_CHARS = 48000;

const readStatus = (error: unknown): number | undefined => {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
};

export const classifyHttpFailure = (status: number, message: string, cause?: unknown): TranslationError => {
  if (status === 401 || status === 403) {
    return new TranslationError('auth', message || 'Translation provider rejected the credentials.', { status, cause });
  }
  if (status === 429) {
    return new TranslationError('rate_limited', message || 'Translation provider rate limit reached.', { status, cause });
  }
  if (status === 400 && /language/i.test(message)) {
    return new TranslationError('unsupported_language', message, { status, cause });
  }
  // other client errors fail the same way on every attempt
  const kind = status >= 400 && status < 500 && status !== 408 ? 'rejected' : 'transient_network';
  return new TranslationError(kind, message || `Translation request failed with status ${status}.`, { status, cause });
};

/** Maps anything the OpenAI SDK throws onto the translation failure kinds. */
export const classifyOpenAiError = (error: unknown): TranslationError => {
  if (error instanceof TranslationError) return error;
  const status = readStatus(error);
  if (status !== undefined) return classifyHttpFailure(status, errorMessage(error), error);
  // connection resets and SDK timeouts carry no status
  return new TranslationError('transient_network', `OpenAI request failed: ${errorMessage(error)}`, { cause: error });
};

export type ChatRequest = {
  model: string;
  system: string;
  user: string;
};

export type ChatCompletionFn = (request: ChatRequest) => Promise<string>;

const openAiChat = (client: OpenAI): ChatCompletionFn => async ({ model, system, user }) => {
  const completion = await client.chat.completions.create({
    model,
    temperature: 0,
    messages: [
      { role: 'system', content: system },
      { role: 'user', content: user },
    ],
  });
  return completion.choices[0]?.message?.content ?? '';
};

export class OpenAiProvider implements TranslationProvider {
  readonly name = 'openai';
  private readonly chat: ChatCompletionFn;

  constructor(private readonly options: { apiKey: string; model: string; chat?: ChatCompletionFn }) {
    // retries are the policy's job
    this.chat = options.chat ?? openAiChat(new OpenAI({ apiKey: options.apiKey, maxRetries: 0 }));
  }

  async translate(text: string, sourceLang: string | undefined, targetLang: string): Promise<Result<string>> {
    const system = [
      'You are a precise translation engine.',
      "Translate the user's text faithfully into the target language, preserving names, numbers, and proper nouns.",
      'Keep paragraph breaks exactly as they are. Do not add commentary. Output ONLY the translation.',
    ].join(' ');
    const source = sourceLang ? `Source language: ${languageName(sourceLang)}\n` : '';
    return this.complete(system, `${source}Target language: ${languageName(targetLang)}\n\nText:\n${text}`);
  }

  async summarize(text: string, maxLen: number): Promise<Result<string>> {
    const system = [
      'You summarize news articles for translation.',
      "Write in the article's own language and keep names, numbers, and dates exact.",
      'Output ONLY the summary as short paragraphs.',
    ].join(' ');
    const result = await this.complete(
      system,
      `Summarize this article in at most ${maxLen} characters.\n\n${truncateHeadTail(text, SUMMARY_INPUT_MAX_CHARS)}`,
    );
    return result.ok ? ok(clipText(result.value, maxLen)) : result;
  }

  private async complete(system: string, user: string): Promise<Result<string>> {
    try {
      const content = (await this.chat({ model: this.options.model, system, user })).trim();
      if (!content) {
        return fail(new TranslationError('transient_network', 'OpenAI returned an empty completion.'));
      }
      return ok(content);
    } catch (error) {
      return fail(classifyOpenAiError(error));
    }
  }
}

export type DeepLClient = {
  translateText(
    text: string,
    sourceLang: deepl.SourceLanguageCode | null,
    targetLang: deepl.TargetLanguageCode,
  ): Promise<{ text: string }>;
};

const translatorClient = (translator: deepl.Translator): DeepLClient => ({
  translateText: (text, sourceLang, targetLang) => translator.translateText(text, sourceLang, targetLang),
});

const DEEPL_TARGETS: Record<string, deepl.TargetLanguageCode> = {
  en: 'en-US',
  es: 'es',
  de: 'de',
  fr: 'fr',
  it: 'it',
  pt: 'pt-PT',
  ja: 'ja',
};

const DEEPL_SOURCES: Record<string, deepl.SourceLanguageCode> = {
  de: 'de',
  en: 'en',
  es: 'es',
  fr: 'fr',
  it: 'it',
  ja: 'ja',
  nl: 'nl',
  pl: 'pl',
  pt: 'pt',
  ru: 'ru',
  zh: 'zh',
};

export const classifyDeepLError = (error: unknown): TranslationError => {
  const message = errorMessage(error);
  if (error instanceof deepl.AuthorizationError) return new TranslationError('auth', message, { cause: error });
  if (error instanceof deepl.TooManyRequestsError || error instanceof deepl.QuotaExceededError) {
    return new TranslationError('rate_limited', message, { cause: error });
  }
  if (error instanceof deepl.ConnectionError) {
    return new TranslationError('transient_network', message, { cause: error });
  }
  if (error instanceof deepl.DeepLError && /language/i.test(message)) {
    return new TranslationError('unsupported_language', message, { cause: error });
  }
  const status = readStatus(error);
  if (status !== undefined) return classifyHttpFailure(status, message, error);
  return new TranslationError('transient_network', `DeepL request failed: ${message}`, { cause: error });
};

export class DeepLProvider implements TranslationProvider {
  readonly name = 'deepl';
  private readonly client: DeepLClient;

  constructor(options: { apiKey: string; client?: DeepLClient }) {
    this.client = options.client ?? translatorClient(new deepl.Translator(options.apiKey, { maxRetries: 0 }));
  }

  async translate(text: string, sourceLang: string | undefined, targetLang: string): Promise<Result<string>> {
    const target = DEEPL_TARGETS[targetLang];
    if (!target) {
      return fail(new TranslationError('unsupported_language', `DeepL cannot translate into "${targetLang}".`));
    }
    const source = sourceLang ? DEEPL_SOURCES[sourceLang] ?? null : null;
    try {
      const result = await this.client.translateText(text, source, target);
      const translated = result.text.trim();
      if (!translated) return fail(new TranslationError('transient_network', 'DeepL returned an empty translation.'));
      return ok(translated);
    } catch (error) {
      return fail(classifyDeepLError(error));
    }
  }

  // DeepL has no summarization endpoint.
  async summarize(text: string, maxLen: number): Promise<Result<string>> {
    return ok(truncateHeadTail(text, maxLen));
  }
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const GOOGLE_TRANSLATE_URL = 'https://translation.googleapis.com/language/translate/v2';

const readGoogleTranslation = (payload: unknown): string => {
  if (!payload || typeof payload !== 'object' || !('data' in payload)) return '';
  const { data } = payload;
  if (!data || typeof data !== 'object' || !('translations' in data) || !Array.isArray(data.translations)) return '';
  const first: unknown = data.translations[0];
  if (!first || typeof first !== 'object' || !('translatedText' in first)) return '';
  return typeof first.translatedText === 'string' ? first.translatedText : '';
};

const readGoogleErrorMessage = (payload: unknown): string => {
  if (!payload || typeof payload !== 'object' || !('error' in payload)) return '';
  const { error } = payload;
  if (!error || typeof error !== 'object' || !('message' in error)) return '';
  return typeof error.message === 'string' ? error.message : '';
};

export class GoogleTranslateProvider implements TranslationProvider {
  readonly name = 'google';
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: { apiKey: string; timeoutMs?: number; fetchImpl?: FetchLike }) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async translate(text: string, sourceLang: string | undefined, targetLang: string): Promise<Result<string>> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${GOOGLE_TRANSLATE_URL}?key=${encodeURIComponent(this.options.apiKey)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ q: text, target: targetLang, source: sourceLang, format: 'text' }),
        timeout: this.options.timeoutMs ?? 0,
      });
    } catch (error) {
      return fail(new TranslationError('transient_network', `Google Translate request failed: ${errorMessage(error)}`, {
        cause: error,
      }));
    }

    let payload: unknown = null;
    try {
      payload = await response.json();
    } catch (error) {
      if (response.ok) {
        return fail(new TranslationError('transient_network', 'Google Translate returned malformed JSON.', { cause: error }));
      }
    }

    if (!response.ok) {
      return fail(classifyHttpFailure(response.status, readGoogleErrorMessage(payload) || response.statusText));
    }
    const translated = readGoogleTranslation(payload).trim();
    if (!translated) return fail(new TranslationError('transient_network', 'Google Translate returned no translation.'));
    return ok(translated);
  }

  // The v2 API translates only.
  async summarize(text: string, maxLen: number): Promise<Result<string>> {
    return ok(truncateHeadTail(text, maxLen));
  }
}

export const createTranslationProvider = (config: RunConfig): TranslationProvider => {
  const { credentials } = config;
  switch (config.translator) {
    case 'openai':
      if (!credentials.openaiApiKey) throw new ConfigError('Missing OPENAI_API_KEY.');
      return new OpenAiProvider({ apiKey: credentials.openaiApiKey, model: config.openaiModel });
    case 'deepl':
      if (!credentials.deeplApiKey) throw new ConfigError('Missing DEEPL_API_KEY.');
      return new DeepLProvider({ apiKey: credentials.deeplApiKey });
    case 'google':
      if (!credentials.googleApiKey) throw new ConfigError('Missing GOOGLE_TRANSLATE_API_KEY.');
      return new GoogleTranslateProvider({
        apiKey: credentials.googleApiKey,
        timeoutMs: config.policy.translateTimeoutMs,
      });
  }
};
