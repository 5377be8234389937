import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { CountingMethod, TokenCounter } from './types.js';
import type { Logger } from './logger.js';
import { wrapError } from './errors.js';

/**
 * Approximate token counter.
 *
 * Heuristic: ~4 characters per token for general-purpose text.
 * Never returns 0, so even an empty turn costs one token.
 */
export class ApproximateTokenCounter implements TokenCounter {
  readonly method: CountingMethod = 'approximate';

  count(text: string): number {
    return Math.max(1, Math.floor(text.length / 4));
  }
}

/**
 * Longest run of non-whitespace characters handed to the encoder.
 * BPE merging is quadratic in the length of a single run, so longer runs
 * (base64, minified code, long URLs) are estimated instead.
 */
export const MAX_ENCODED_RUN = 200;

const LONG_RUN = new RegExp(`\\S{${MAX_ENCODED_RUN + 1},}`, 'g');

/**
 * Precise counter backed by a tiktoken vocabulary.
 *
 * Special-token text such as `<|endoftext|>` is counted as ordinary text
 * instead of being rejected by the encoder. Runs longer than
 * MAX_ENCODED_RUN are counted approximately.
 */
export class TiktokenCounter implements TokenCounter {
  readonly method: CountingMethod = 'tiktoken';
  readonly encoding: TiktokenEncoding;
  private encoder: Pick<Tiktoken, 'encode'>;
  private fallback = new ApproximateTokenCounter();

  constructor(encoding: TiktokenEncoding, encoder: Pick<Tiktoken, 'encode'> = loadEncoder(encoding)) {
    this.encoding = encoding;
    this.encoder = encoder;
  }

  count(text: string): number {
    let total = 0;
    let offset = 0;

    for (const run of text.matchAll(LONG_RUN)) {
      const start = run.index ?? offset;
      total += this.encode(text.slice(offset, start));
      total += this.fallback.count(run[0]);
      offset = start + run[0].length;
    }

    return total + this.encode(text.slice(offset));
  }

  private encode(text: string): number {
    if (!text) return 0;

    try {
      return this.encoder.encode(text, [], []).length;
    } catch {
      return this.fallback.count(text);
    }
  }
}

// Tokenizer tables are immutable and costly to parse, so they are shared by encoding name.
const encoderCache = new Map<TiktokenEncoding, Tiktoken>();

function loadEncoder(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoderCache.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoderCache.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Model name prefixes whose vocabulary ships with js-tiktoken.
 * Longer prefixes first: `gpt-4o` must win over `gpt-4`.
 */
const MODEL_PREFIX_ENCODINGS: ReadonlyArray<readonly [string, TiktokenEncoding]> = [
  ['gpt-4o', 'o200k_base'],
  ['gpt-4.1', 'o200k_base'],
  ['o1', 'o200k_base'],
  ['o3', 'o200k_base'],
  ['gpt-4', 'cl100k_base'],
  ['gpt-3.5', 'cl100k_base'],
  ['text-embedding-3', 'cl100k_base'],
  ['text-embedding-ada-002', 'cl100k_base'],
];

/**
 * Find the tokenizer vocabulary for a model identifier.
 * Provider prefixes (`openai/gpt-4o`) are ignored.
 */
export function resolveEncoding(modelName: string): TiktokenEncoding | undefined {
  const bareName = modelName.split('/').pop() ?? modelName;
  for (const [prefix, encoding] of MODEL_PREFIX_ENCODINGS) {
    if (bareName.startsWith(prefix)) {
      return encoding;
    }
  }
  return undefined;
}

export type CounterFallbackReason = 'unknown-model' | 'tokenizer-error';

export interface CreateTokenCounterOptions {
  /** Vocabulary to use, overriding resolution by model name */
  encoding?: TiktokenEncoding;
  logger?: Logger;
  /** Called whenever the approximate counter is chosen */
  onFallback?: (reason: CounterFallbackReason, error?: Error) => void;
}

/**
 * Build the most precise counter available for a model.
 *
 * Tries a tiktoken vocabulary first and falls back to the approximate
 * counter when none is known for the model or it cannot be loaded.
 *
 * @example
 * ```ts
 * const counter = createTokenCounter('gpt-4o');
 * counter.method;             // 'tiktoken'
 * counter.count('hello world'); // 2
 *
 * createTokenCounter('llama3-8b-8192').method; // 'approximate'
 * ```
 */
export function createTokenCounter(
  modelName: string,
  options: CreateTokenCounterOptions = {}
): TokenCounter {
  const encoding = options.encoding ?? resolveEncoding(modelName);

  if (!encoding) {
    options.logger?.debug('No tokenizer known for model, using approximate counting', { modelName });
    options.onFallback?.('unknown-model');
    return new ApproximateTokenCounter();
  }

  try {
    return new TiktokenCounter(encoding);
  } catch (error) {
    const wrapped = wrapError(error, `loading tokenizer ${encoding}`);
    options.logger?.warn('Tokenizer unavailable, falling back to approximate counting', {
      modelName,
      encoding,
      reason: wrapped.message,
    });
    options.onFallback?.('tokenizer-error', wrapped);
    return new ApproximateTokenCounter();
  }
}

/**
 * Estimate tokens for a single rendered message
 */
export function countMessageTokens(
  message: { role: string; content: string },
  counter: TokenCounter = new ApproximateTokenCounter()
): number {
  return counter.count(message.content) + 4; // +4 for message structure overhead
}

/**
 * Estimate tokens for a rendered message array
 */
export function countMessagesTokens(
  messages: Array<{ role: string; content: string }>,
  counter: TokenCounter = new ApproximateTokenCounter()
): number {
  let total = 0;

  for (const message of messages) {
    total += countMessageTokens(message, counter);
  }

  // Base overhead for the messages array (~3 tokens)
  return total + 3;
}
