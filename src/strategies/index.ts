import type { ConversationTurn } from '../types.js';
import { ConfigurationError } from '../errors.js';
import { sortChronologically, sumTokens } from '../utils.js';

/**
 * Decides which turns survive when history outgrows the model's budget
 */
export interface RetentionStrategy {
  /** Name of the strategy for logs and events */
  readonly name: string;

  /**
   * Select the turns to keep
   * @param turns - Current history in chronological order
   * @param budget - Budget of the active model
   * @returns Kept turns in chronological order, plus the evicted ones
   */
  select(turns: readonly ConversationTurn[], budget: RetentionBudget): RetentionResult;
}

export interface RetentionBudget {
  /** Tokens available for history (system prompt included) */
  availableTokens: number;
  /** Tokens already taken by the system prompt */
  systemPromptTokens: number;
}

export interface RetentionResult {
  kept: ConversationTurn[];
  evicted: ConversationTurn[];
  /** Tokens of the kept turns plus the system prompt */
  tokenCount: number;
  withinBudget: boolean;
}

export interface RetentionStrategyOptions {
  /** Most recent turns that are never evicted (default: 2) */
  protectedTurns?: number;
}

function resolveProtectedTurns(options: RetentionStrategyOptions): number {
  const protectedTurns = options.protectedTurns ?? 2;
  if (!Number.isInteger(protectedTurns) || protectedTurns < 0) {
    throw new ConfigurationError('protectedTurns must be a non-negative integer', { protectedTurns });
  }
  return protectedTurns;
}

function unchanged(turns: readonly ConversationTurn[], budget: RetentionBudget): RetentionResult {
  const tokenCount = sumTokens(turns) + budget.systemPromptTokens;
  return {
    kept: [...turns],
    evicted: [],
    tokenCount,
    withinBudget: tokenCount <= budget.availableTokens,
  };
}

/**
 * Hybrid Retention Strategy
 *
 * Keeps the most recent turns unconditionally, then fills the remaining
 * budget with the highest-scoring older turns. Selection is greedy: it
 * stops at the first candidate that would overflow the budget.
 *
 * @example
 * ```ts
 * const strategy = new HybridRetentionStrategy({ protectedTurns: 2 });
 * const { kept } = strategy.select(history, { availableTokens: 2896, systemPromptTokens: 40 });
 * ```
 */
export class HybridRetentionStrategy implements RetentionStrategy {
  readonly name = 'hybrid';
  private protectedTurns: number;

  constructor(options: RetentionStrategyOptions = {}) {
    this.protectedTurns = resolveProtectedTurns(options);
  }

  select(turns: readonly ConversationTurn[], budget: RetentionBudget): RetentionResult {
    const current = unchanged(turns, budget);
    if (current.withinBudget || turns.length <= this.protectedTurns) {
      return current;
    }

    const split = turns.length - this.protectedTurns;
    const protectedTurns = turns.slice(split);
    const candidates = turns.slice(0, split);

    // Highest score first; on a tie the more recent turn wins
    const ranked = [...candidates].sort(
      (a, b) => b.importanceScore - a.importanceScore || b.sequence - a.sequence
    );

    let tokenCount = sumTokens(protectedTurns) + budget.systemPromptTokens;
    const accepted: ConversationTurn[] = [];

    for (const turn of ranked) {
      if (tokenCount + turn.tokenCount > budget.availableTokens) {
        break;
      }
      accepted.push(turn);
      tokenCount += turn.tokenCount;
    }

    const acceptedIds = new Set(accepted.map((turn) => turn.id));

    return {
      kept: [...sortChronologically(accepted), ...protectedTurns],
      evicted: candidates.filter((turn) => !acceptedIds.has(turn.id)),
      tokenCount,
      withinBudget: tokenCount <= budget.availableTokens,
    };
  }
}

/**
 * Recency Retention Strategy
 *
 * Drops the oldest turns until history fits, ignoring importance.
 * Predictable, and keeps the retained history contiguous.
 */
export class RecencyRetentionStrategy implements RetentionStrategy {
  readonly name = 'recency';
  private protectedTurns: number;

  constructor(options: RetentionStrategyOptions = {}) {
    this.protectedTurns = resolveProtectedTurns(options);
  }

  select(turns: readonly ConversationTurn[], budget: RetentionBudget): RetentionResult {
    const current = unchanged(turns, budget);
    if (current.withinBudget || turns.length <= this.protectedTurns) {
      return current;
    }

    const split = turns.length - this.protectedTurns;
    let tokenCount = sumTokens(turns.slice(split)) + budget.systemPromptTokens;
    let firstKept = split;

    while (firstKept > 0) {
      const next = turns[firstKept - 1];
      if (!next || tokenCount + next.tokenCount > budget.availableTokens) {
        break;
      }
      tokenCount += next.tokenCount;
      firstKept--;
    }

    return {
      kept: turns.slice(firstKept),
      evicted: turns.slice(0, firstKept),
      tokenCount,
      withinBudget: tokenCount <= budget.availableTokens,
    };
  }
}
