import type { TiktokenEncoding } from 'js-tiktoken';
import type { ModelContextProfile } from './types.js';
import { ConfigurationError } from './errors.js';

/**
 * Profile used for any model the table does not know
 */
export const DEFAULT_PROFILE: Readonly<ModelContextProfile> = Object.freeze({
  maxContextTokens: 4096,
  maxOutputTokens: 1000,
  reservedTokens: 200,
});

export const DEFAULT_RESERVED_TOKENS = 200;

/**
 * Built-in capacity table
 */
export const BUILT_IN_PROFILES: Readonly<Record<string, ModelContextProfile>> = {
  // Groq
  'llama3-70b-8192': { maxContextTokens: 8192, maxOutputTokens: 1000, reservedTokens: 200 },
  'llama3-8b-8192': { maxContextTokens: 8192, maxOutputTokens: 1000, reservedTokens: 200 },
  'gemma2-9b-it': { maxContextTokens: 8192, maxOutputTokens: 1000, reservedTokens: 200 },

  // HuggingFace
  'google/gemma-2-2b-it': { maxContextTokens: 8192, maxOutputTokens: 1000, reservedTokens: 200 },
  'deepseek-ai/DeepSeek-R1-Distill-Qwen-1.5B': { maxContextTokens: 32768, maxOutputTokens: 2000, reservedTokens: 500 },
  'microsoft/phi-4': { maxContextTokens: 16384, maxOutputTokens: 1500, reservedTokens: 300 },
  'Qwen/Qwen2.5-Coder-32B-Instruct': { maxContextTokens: 32768, maxOutputTokens: 2000, reservedTokens: 500 },
  'deepseek-ai/DeepSeek-R1': { maxContextTokens: 131072, maxOutputTokens: 4000, reservedTokens: 1000 },

  // OpenAI (vocabularies available to the precise counter)
  'gpt-4o': { maxContextTokens: 128000, maxOutputTokens: 16384, reservedTokens: 500, encoding: 'o200k_base' },
  'gpt-4o-mini': { maxContextTokens: 128000, maxOutputTokens: 16384, reservedTokens: 500, encoding: 'o200k_base' },
  'gpt-4-turbo': { maxContextTokens: 128000, maxOutputTokens: 4096, reservedTokens: 500, encoding: 'cl100k_base' },
  'gpt-3.5-turbo': { maxContextTokens: 16385, maxOutputTokens: 4096, reservedTokens: 200, encoding: 'cl100k_base' },
};

const KNOWN_ENCODINGS: readonly TiktokenEncoding[] = [
  'gpt2',
  'r50k_base',
  'p50k_base',
  'p50k_edit',
  'cl100k_base',
  'o200k_base',
];

/**
 * Tokens left for conversation history once the reply and safety margin are reserved
 */
export function availableTokens(profile: ModelContextProfile): number {
  return profile.maxContextTokens - profile.maxOutputTokens - profile.reservedTokens;
}

function isKnownEncoding(value: unknown): value is TiktokenEncoding {
  return KNOWN_ENCODINGS.some((encoding) => encoding === value);
}

function readTokenField(name: string, field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`profile "${name}" has invalid ${field}`, { model: name, field, value });
  }
  return value;
}

/**
 * Validate an untyped profile entry (e.g. parsed from a JSON config file)
 */
export function parseProfile(name: string, raw: unknown): ModelContextProfile {
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError(`profile "${name}" must be an object`, { model: name });
  }

  const entry: Record<string, unknown> = { ...raw };
  const profile: ModelContextProfile = {
    maxContextTokens: readTokenField(name, 'maxContextTokens', entry.maxContextTokens),
    maxOutputTokens: readTokenField(name, 'maxOutputTokens', entry.maxOutputTokens),
    reservedTokens: readTokenField(name, 'reservedTokens', entry.reservedTokens ?? DEFAULT_RESERVED_TOKENS),
  };

  if (entry.encoding !== undefined) {
    if (!isKnownEncoding(entry.encoding)) {
      throw new ConfigurationError(`profile "${name}" has unknown encoding`, { model: name, encoding: entry.encoding });
    }
    profile.encoding = entry.encoding;
  }

  validateProfile(name, profile);
  return profile;
}

/**
 * Reject profiles that leave no room for history
 */
export function validateProfile(name: string, profile: ModelContextProfile): void {
  const available = availableTokens(profile);
  if (available <= 0) {
    throw new ConfigurationError(`profile "${name}" leaves no tokens for history`, {
      model: name,
      availableTokens: available,
    });
  }
}

/**
 * Maps model identifiers to context profiles.
 *
 * Lookup is total: unknown identifiers resolve to the default profile.
 *
 * @example
 * ```ts
 * const profiles = createDefaultProfileRegistry();
 * profiles.register('my-local-model', { maxContextTokens: 2048, maxOutputTokens: 512, reservedTokens: 100 });
 *
 * profiles.profileFor('my-local-model'); // available budget 1436
 * profiles.profileFor('unheard-of');     // DEFAULT_PROFILE
 * ```
 */
export class ModelProfileRegistry {
  private profiles = new Map<string, ModelContextProfile>();
  private fallback: ModelContextProfile;

  constructor(
    profiles: Readonly<Record<string, ModelContextProfile>> = {},
    fallback: ModelContextProfile = DEFAULT_PROFILE
  ) {
    validateProfile('default', fallback);
    this.fallback = { ...fallback };
    for (const [name, profile] of Object.entries(profiles)) {
      this.register(name, profile);
    }
  }

  /**
   * Build a registry from an external table such as a parsed JSON file.
   * A `default` key replaces the default profile.
   */
  static fromRecord(record: unknown, options: { includeBuiltIns?: boolean } = {}): ModelProfileRegistry {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      throw new ConfigurationError('model profile table must be an object');
    }

    const parsed: Record<string, ModelContextProfile> = {};
    let fallback: ModelContextProfile = DEFAULT_PROFILE;

    for (const [name, raw] of Object.entries(record)) {
      const profile = parseProfile(name, raw);
      if (name === 'default') {
        fallback = profile;
      } else {
        parsed[name] = profile;
      }
    }

    const base = options.includeBuiltIns ? { ...BUILT_IN_PROFILES } : {};
    return new ModelProfileRegistry({ ...base, ...parsed }, fallback);
  }

  register(modelName: string, profile: ModelContextProfile): void {
    if (!modelName) {
      throw new ConfigurationError('model name must not be empty');
    }
    validateProfile(modelName, profile);
    this.profiles.set(modelName, { ...profile });
  }

  has(modelName: string): boolean {
    return this.profiles.has(modelName);
  }

  /**
   * Profile for a model, or the default profile when the model is unknown
   */
  profileFor(modelName: string): ModelContextProfile {
    return { ...(this.profiles.get(modelName) ?? this.fallback) };
  }

  getDefault(): ModelContextProfile {
    return { ...this.fallback };
  }

  list(): string[] {
    return [...this.profiles.keys()];
  }
}

/**
 * A fresh registry holding the built-in table
 */
export function createDefaultProfileRegistry(): ModelProfileRegistry {
  return new ModelProfileRegistry(BUILT_IN_PROFILES);
}
