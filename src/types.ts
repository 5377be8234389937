import type { TiktokenEncoding } from 'js-tiktoken';

/**
 * Roles a stored conversation turn can have
 */
export type TurnRole = 'user' | 'assistant';

/**
 * Roles of a rendered message, compatible with OpenAI/Anthropic APIs
 */
export type MessageRole = 'system' | TurnRole;

/**
 * A single turn in the conversation history.
 * Turns are immutable; a model switch replaces them with recounted copies.
 */
export interface ConversationTurn {
  /** Unique identifier for the turn */
  readonly id: string;
  /** Insertion order within the owning store */
  readonly sequence: number;
  /** Creation time (epoch ms) */
  readonly timestamp: number;
  readonly role: TurnRole;
  readonly content: string;
  /** Tokens counted by the store's active counter */
  readonly tokenCount: number;
  /** Heuristic priority used when pruning */
  readonly importanceScore: number;
  /** Backend that produced an assistant turn ('' for user turns) */
  readonly provider: string;
}

/**
 * A simplified message format for LLM API calls
 * Compatible with OpenAI ChatCompletionMessageParam
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * Anthropic-style payload: the system prompt travels outside the message list
 */
export interface AnthropicPayload {
  system?: string;
  messages: Array<{ role: TurnRole; content: string }>;
}

export type RenderFormat = 'messages' | 'text' | 'anthropic';

/**
 * Static capacity description of a model
 */
export interface ModelContextProfile {
  /** Total tokens the model can process (prompt + reply) */
  maxContextTokens: number;
  /** Tokens reserved for the model's reply */
  maxOutputTokens: number;
  /** Safety margin for system/instruction overhead */
  reservedTokens: number;
  /** Tokenizer vocabulary of the model family, when one is known */
  encoding?: TiktokenEncoding;
}

export type CountingMethod = 'tiktoken' | 'approximate';

/**
 * Converts text into a token count. Implementations never throw.
 */
export interface TokenCounter {
  readonly method: CountingMethod;
  count(text: string): number;
}

/**
 * Builds the counter used for a model. Called on construction and on every model switch.
 */
export type TokenCounterFactory = (modelName: string, profile: ModelContextProfile) => TokenCounter;

/**
 * Options accepted by addMessage
 */
export interface AddMessageOptions {
  /** Backend that produced the turn (assistant turns) */
  provider?: string;
  /** Creation time override, used when replaying a snapshot */
  timestamp?: number;
}

/**
 * Context statistics
 */
export interface ContextStats {
  modelName: string;
  /** Number of turns currently retained */
  totalTurns: number;
  /** Retained turn tokens plus system prompt tokens */
  totalTokens: number;
  systemPromptTokens: number;
  /** Budget left for history by the active profile */
  availableTokens: number;
  /** totalTokens / availableTokens * 100 (0 when nothing is available) */
  utilizationPercentage: number;
  countingMethod: CountingMethod;
  maxContextTokens: number;
  maxOutputTokens: number;
  reservedTokens: number;
}

/**
 * Per-turn entry of the analytics report
 */
export interface TurnAnalysis {
  id: string;
  role: TurnRole;
  tokenCount: number;
  importanceScore: number;
  ageMinutes: number;
  provider: string;
  contentPreview: string;
}

/**
 * Detailed context analytics for debugging and tuning
 */
export interface ContextAnalytics {
  stats: ContextStats;
  turns: TurnAnalysis[];
  modelLimits: {
    maxContextTokens: number;
    maxOutputTokens: number;
    availableTokens: number;
    reservedTokens: number;
  };
  retention: {
    /** Turns ever added to this store */
    turnsAdded: number;
    turnsInContext: number;
    turnsEvicted: number;
    /** Share of added turns no longer in context, in percent */
    pruningEfficiency: number;
  };
}

/**
 * Outcome of a model switch
 */
export interface ModelSwitchReport {
  previousModel: string;
  newModel: string;
  utilizationBefore: number;
  utilizationAfter: number;
  turnsBefore: number;
  turnsAfter: number;
  tokensBefore: number;
  tokensAfter: number;
}
