import { TranslationError, fail, ok, type Result } from './errors';
import type { Logger } from './logger';
import type { TranslationProvider } from './providers';
import type { PlanKind, PolicyOptions, TextSpan, TranslationPlan } from './types';

const PARAGRAPH_BREAK = '\n\n';
const TRUNCATION_MARKER = '\n\n[...TRUNCATED...]\n\n';

const SENTENCE_END = /[.!?;:。！？；]["'”’)\]]?$/;
const CJK_SENTENCE_END = /[。！？]$/;

export type PlanOptions = Pick<PolicyOptions, 'chunkSize' | 'summarizeMultiplier' | 'splitLookback'>;

export type ExecuteOptions = PolicyOptions & {
  targetLang: string;
  sourceLang?: string;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
};

export type PlanExecution = {
  kind: PlanKind;
  text: string;
  partiallyTranslated: boolean;
};

/** Keeps the beginning and the end of an over-long text; the end often carries the key facts. */
export const truncateHeadTail = (text: string, maxChars: number) => {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;
  const room = maxChars - TRUNCATION_MARKER.length;
  if (room <= 0) return trimmed.slice(0, maxChars);
  const headLength = Math.floor(room * 0.7);
  const tailLength = room - headLength;
  return `${trimmed.slice(0, headLength)}${TRUNCATION_MARKER}${trimmed.slice(trimmed.length - tailLength)}`;
};

export const clipText = (text: string, maxLen: number) => {
  const trimmed = text.trim();
  if (trimmed.length <= maxLen) return trimmed;
  const room = maxLen - 1;
  let cut = trimmed.lastIndexOf(' ', room);
  if (cut < room * 0.6) cut = room;
  return `${trimmed.slice(0, cut).trimEnd()}…`;
};

const isWhitespace = (char: string | undefined) => char !== undefined && /\s/.test(char);

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

// Where to cut `text` so the head is at most `limit` characters.
const findCut = (text: string, limit: number, lookback: number) => {
  const windowStart = Math.max(1, limit - lookback);

  for (let index = limit; index >= windowStart; index -= 1) {
    const head = text.slice(0, index);
    if (CJK_SENTENCE_END.test(head)) return index;
    if (SENTENCE_END.test(head) && isWhitespace(text[index])) return index;
  }
  for (let index = limit; index >= windowStart; index -= 1) {
    if (isWhitespace(text[index])) return index;
  }
  if (!isHighSurrogate(text.charCodeAt(limit - 1))) return limit;
  // a surrogate pair is never split, even when it alone overflows the limit
  return limit > 1 ? limit - 1 : limit + 1;
};

const splitParagraph = (paragraph: string, limit: number, lookback: number): TextSpan[] => {
  const pieces: TextSpan[] = [];
  let rest = paragraph;
  while (rest.length > limit) {
    const cut = findCut(rest, limit, lookback);
    let next = cut;
    while (next < rest.length && isWhitespace(rest[next])) next += 1;
    pieces.push({ text: rest.slice(0, cut), joiner: rest.slice(cut, next) });
    rest = rest.slice(next);
  }
  if (rest) pieces.push({ text: rest, joiner: PARAGRAPH_BREAK });
  return pieces;
};

/**
 * Splits text into ordered spans of at most `limit` characters. Whole
 * paragraphs are packed together where they fit; a longer paragraph is cut at
 * a sentence end inside the lookback window, else at whitespace, else hard.
 */
export const splitIntoChunks = (text: string, limit: number, lookback: number): TextSpan[] => {
  const paragraphs = text
    .split(/\n[ \t\r\f\v]*\n\s*/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);

  const spans: TextSpan[] = [];
  let current = '';
  const flush = () => {
    if (!current) return;
    spans.push({ text: current, joiner: PARAGRAPH_BREAK });
    current = '';
  };

  for (const paragraph of paragraphs) {
    if (paragraph.length > limit) {
      flush();
      spans.push(...splitParagraph(paragraph, limit, lookback));
      continue;
    }
    const candidate = current ? `${current}${PARAGRAPH_BREAK}${paragraph}` : paragraph;
    if (candidate.length <= limit) {
      current = candidate;
    } else {
      flush();
      current = paragraph;
    }
  }
  flush();

  const last = spans[spans.length - 1];
  if (last) spans[spans.length - 1] = { ...last, joiner: '' };
  return spans;
};

export const reassemble = (texts: string[], spans: TextSpan[]) =>
  texts.map((text, index) => `${text}${spans[index]?.joiner ?? ''}`).join('');

export const planTranslation = (text: string, options: PlanOptions): TranslationPlan => {
  const limit = options.chunkSize;
  if (text.length <= limit) {
    return { kind: 'whole', chunks: [{ text, joiner: '' }] };
  }
  if (text.length <= limit * options.summarizeMultiplier) {
    return { kind: 'chunked', chunks: splitIntoChunks(text, limit, options.splitLookback) };
  }
  return { kind: 'summarized', chunks: [{ text, joiner: '' }] };
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const withTimeout = async <T>(call: Promise<Result<T>>, timeoutMs: number): Promise<Result<T>> => {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<Result<T>>((resolve) => {
    timer = setTimeout(
      () => resolve(fail<T>(new TranslationError('timeout', `Provider call timed out after ${timeoutMs}ms.`))),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([call, expired]);
  } finally {
    clearTimeout(timer);
  }
};

/** One provider translation, retried with exponential backoff while the failure is retryable. */
export const translateWithRetry = async (
  provider: TranslationProvider,
  text: string,
  options: ExecuteOptions,
): Promise<Result<string>> => {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = options.retryCount + 1;
  for (let attempt = 1; ; attempt += 1) {
    const result = await withTimeout(
      provider.translate(text, options.sourceLang, options.targetLang),
      options.translateTimeoutMs,
    );
    if (result.ok || !result.error.retryable || attempt >= attempts) return result;
    const delay = options.retryBaseDelayMs * 2 ** (attempt - 1);
    options.log?.debug(`${result.error.kind} on attempt ${attempt}/${attempts}, retrying in ${delay}ms`);
    await sleep(delay);
  }
};

const translateSpans = async (
  spans: TextSpan[],
  provider: TranslationProvider,
  options: ExecuteOptions,
): Promise<Result<{ text: string; partiallyTranslated: boolean }>> => {
  const translated: string[] = [];
  let partiallyTranslated = false;

  for (const span of spans) {
    if (!span.text.trim()) {
      translated.push(span.text);
      continue;
    }
    const result = await translateWithRetry(provider, span.text, options);
    if (result.ok) {
      translated.push(result.value);
      continue;
    }
    if (result.error.kind === 'auth' || result.error.kind === 'unsupported_language') {
      return fail(result.error);
    }
    // keep the source text for this span and carry on with the rest
    options.log?.warn(`chunk left untranslated (${result.error.kind}): ${result.error.message}`);
    translated.push(span.text);
    partiallyTranslated = true;
  }

  return ok({ text: reassemble(translated, spans), partiallyTranslated });
};

/**
 * Runs a plan through the provider. Auth and unsupported-language failures are
 * returned as errors; anything else degrades the affected chunk to its source.
 */
export const executePlan = async (
  plan: TranslationPlan,
  provider: TranslationProvider,
  options: ExecuteOptions,
): Promise<Result<PlanExecution>> => {
  let spans = plan.chunks;

  if (plan.kind === 'summarized') {
    const source = reassemble(
      plan.chunks.map((chunk) => chunk.text),
      plan.chunks,
    );
    const summary = await withTimeout(provider.summarize(source, options.summaryMaxChars), options.translateTimeoutMs);
    let summaryText: string;
    if (summary.ok && summary.value.trim()) {
      summaryText = summary.value;
    } else if (!summary.ok && summary.error.kind === 'auth') {
      return fail(summary.error);
    } else {
      options.log?.warn('summary unavailable, falling back to head/tail truncation');
      summaryText = truncateHeadTail(source, options.summaryMaxChars);
    }
    // the summary is never summarized again, only chunked when still too long
    spans = planTranslation(summaryText, { ...options, summarizeMultiplier: Number.POSITIVE_INFINITY }).chunks;
  }

  const result = await translateSpans(spans, provider, options);
  if (!result.ok) return fail(result.error);
  return ok({ kind: plan.kind, ...result.value });
};
