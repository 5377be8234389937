import type {
  AddMessageOptions,
  AnthropicPayload,
  ContextAnalytics,
  ContextStats,
  ConversationTurn,
  CountingMethod,
  LLMMessage,
  ModelContextProfile,
  ModelSwitchReport,
  RenderFormat,
  TokenCounter,
  TokenCounterFactory,
  TurnRole,
} from './types.js';
import type { ContextHooks } from './hooks.js';
import { ImportanceScorer } from './importance.js';
import { Logger, createDefaultLogger } from './logger.js';
import { ModelProfileRegistry, availableTokens, createDefaultProfileRegistry } from './model-profiles.js';
import { HybridRetentionStrategy, type RetentionStrategy } from './strategies/index.js';
import { createTokenCounter } from './token-counter.js';
import { generateId, now, preview, sumTokens, utilization } from './utils.js';

/**
 * Configuration options for ContextStore
 */
export interface ContextStoreOptions {
  /** Model whose profile sets the budget; unknown names get the default profile (default: 'default') */
  modelName?: string;
  /** Fixed instructions sent ahead of the history */
  systemPrompt?: string;
  /** Model capacity table (default: the built-in table) */
  profiles?: ModelProfileRegistry;
  /** Builds the token counter for a model (default: tiktoken with approximate fallback) */
  counterFactory?: TokenCounterFactory;
  scorer?: ImportanceScorer;
  /** Pruning strategy (default: HybridRetentionStrategy) */
  strategy?: RetentionStrategy;
  hooks?: ContextHooks;
  logger?: Logger;
  /** Label used in events and log lines */
  sessionId?: string;
}

const ROLE_LABELS: Record<TurnRole, string> = {
  user: 'User',
  assistant: 'Assistant',
};

/**
 * ContextStore - the working set of one conversation.
 *
 * Every insertion re-optimizes the history so that it fits the active
 * model's available budget, evicting low-importance older turns while
 * the most recent exchange is always kept.
 *
 * @example
 * ```ts
 * const context = new ContextStore({
 *   modelName: 'llama3-8b-8192',
 *   systemPrompt: 'You are a helpful assistant.',
 * });
 *
 * context.addMessage('user', 'My budget is $500. What can I get?');
 * const messages = context.render('messages');
 *
 * const reply = await client.chat(messages);
 * context.addMessage('assistant', reply, { provider: 'groq' });
 *
 * context.stats().utilizationPercentage;
 * ```
 */
export class ContextStore {
  private history: ConversationTurn[] = [];
  private systemPrompt: string;
  private systemPromptTokens = 0;
  private modelName: string;
  private profile: ModelContextProfile;
  private counter: TokenCounter;
  private sequence = 0;
  private turnsAdded = 0;
  private turnsEvicted = 0;

  private readonly profiles: ModelProfileRegistry;
  private readonly counterFactory: TokenCounterFactory;
  private readonly scorer: ImportanceScorer;
  private readonly strategy: RetentionStrategy;
  private readonly hooks?: ContextHooks;
  private readonly logger: Logger;
  private readonly sessionId: string;

  constructor(options: ContextStoreOptions = {}) {
    const modelName = options.modelName ?? 'default';

    this.sessionId = options.sessionId ?? generateId('session');
    this.logger = (options.logger ?? createDefaultLogger()).child({ sessionId: this.sessionId });
    this.hooks = options.hooks;
    this.profiles = options.profiles ?? createDefaultProfileRegistry();
    this.counterFactory = options.counterFactory ?? this.defaultCounterFactory();
    this.scorer = options.scorer ?? new ImportanceScorer();
    this.strategy = options.strategy ?? new HybridRetentionStrategy();

    this.modelName = modelName;
    this.profile = this.profiles.profileFor(modelName);
    this.counter = this.counterFactory(modelName, this.profile);

    this.systemPrompt = options.systemPrompt ?? '';
    this.systemPromptTokens = this.countSystemPrompt();
  }

  /**
   * Add a turn and re-optimize the history for the active budget
   *
   * @param role - 'user' or 'assistant'
   * @param content - The turn's text (any string, including empty)
   * @param options - Provider that produced an assistant turn, or a timestamp override
   * @returns The stored turn
   */
  addMessage(role: TurnRole, content: string, options: AddMessageOptions = {}): ConversationTurn {
    const tokenCount = this.counter.count(content);
    const turn: ConversationTurn = {
      id: generateId('turn'),
      sequence: this.sequence++,
      timestamp: options.timestamp ?? now(),
      role,
      content,
      tokenCount,
      importanceScore: this.scorer.score(role, content, tokenCount),
      provider: options.provider ?? '',
    };

    this.history.push(turn);
    this.turnsAdded++;
    this.prune();

    this.hooks?.emit('turnAdded', {
      ...this.eventBase(),
      turn,
      totalTokens: this.totalTokens(),
      availableTokens: this.availableTokens(),
    });

    return turn;
  }

  /**
   * Run the retention strategy against the current budget.
   * A history already within budget is left untouched.
   *
   * @returns The evicted turns
   */
  prune(): ConversationTurn[] {
    const available = this.availableTokens();
    const tokensBefore = this.totalTokens();

    const result = this.strategy.select(this.history, {
      availableTokens: available,
      systemPromptTokens: this.systemPromptTokens,
    });

    if (result.evicted.length > 0) {
      this.history = result.kept;
      this.turnsEvicted += result.evicted.length;

      this.logger.debug('Pruned context', {
        strategy: this.strategy.name,
        evicted: result.evicted.length,
        kept: result.kept.length,
        tokensBefore,
        tokensAfter: result.tokenCount,
        availableTokens: available,
      });

      this.hooks?.emit('turnsPruned', {
        ...this.eventBase(),
        strategy: this.strategy.name,
        evicted: result.evicted,
        keptTurns: result.kept.length,
        tokensBefore,
        tokensAfter: result.tokenCount,
        availableTokens: available,
      });
    }

    if (!result.withinBudget) {
      this.hooks?.emit('budgetExceeded', {
        ...this.eventBase(),
        totalTokens: result.tokenCount,
        availableTokens: available,
        utilizationPercentage: utilization(result.tokenCount, available),
        turnCount: this.history.length,
      });
    }

    return result.evicted;
  }

  /**
   * Render the retained context
   *
   * - `messages`: role/content list, system prompt first (OpenAI style)
   * - `text`: flattened, labeled transcript
   * - `anthropic`: system prompt separated from the message list
   */
  render(format: 'text'): string;
  render(format: 'anthropic'): AnthropicPayload;
  render(format?: 'messages'): LLMMessage[];
  render(format: RenderFormat = 'messages'): string | LLMMessage[] | AnthropicPayload {
    switch (format) {
      case 'text':
        return this.renderText();
      case 'anthropic':
        return this.renderAnthropic();
      case 'messages':
        return this.renderMessages();
    }
  }

  renderMessages(): LLMMessage[] {
    const messages: LLMMessage[] = [];

    if (this.systemPrompt) {
      messages.push({ role: 'system', content: this.systemPrompt });
    }

    for (const turn of this.history) {
      messages.push({ role: turn.role, content: turn.content });
    }

    return messages;
  }

  renderText(): string {
    const parts: string[] = [];

    if (this.systemPrompt) {
      parts.push(`System: ${this.systemPrompt}`);
    }

    if (this.history.length > 0) {
      parts.push('\nConversation context:');
      for (const turn of this.history) {
        parts.push(`${ROLE_LABELS[turn.role]}: ${turn.content}`);
      }
    }

    return parts.join('\n');
  }

  renderAnthropic(): AnthropicPayload {
    const payload: AnthropicPayload = {
      messages: this.history.map((turn) => ({ role: turn.role, content: turn.content })),
    };
    if (this.systemPrompt) {
      payload.system = this.systemPrompt;
    }
    return payload;
  }

  /**
   * Replace the system prompt. Its tokens count against the budget,
   * so the history is re-optimized.
   */
  setSystemPrompt(prompt: string): void {
    this.systemPrompt = prompt;
    this.systemPromptTokens = this.countSystemPrompt();
    this.prune();
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  /**
   * Move the conversation to another model.
   *
   * Every retained turn is recounted with the new model's counter and
   * rescored, then the history is pruned against the new budget.
   */
  switchModel(newModelName: string): ModelSwitchReport {
    const before = this.stats();
    const previousModel = this.modelName;

    this.modelName = newModelName;
    this.profile = this.profiles.profileFor(newModelName);
    this.counter = this.counterFactory(newModelName, this.profile);
    this.systemPromptTokens = this.countSystemPrompt();

    this.history = this.history.map((turn) => {
      const tokenCount = this.counter.count(turn.content);
      return {
        ...turn,
        tokenCount,
        importanceScore: this.scorer.score(turn.role, turn.content, tokenCount),
      };
    });

    this.prune();

    const after = this.stats();
    const report: ModelSwitchReport = {
      previousModel,
      newModel: newModelName,
      utilizationBefore: before.utilizationPercentage,
      utilizationAfter: after.utilizationPercentage,
      turnsBefore: before.totalTurns,
      turnsAfter: after.totalTurns,
      tokensBefore: before.totalTokens,
      tokensAfter: after.totalTokens,
    };

    this.logger.info(`Context optimized for ${newModelName} (was ${previousModel})`, {
      utilization: `${after.utilizationPercentage.toFixed(1)}%`,
      totalTokens: after.totalTokens,
      availableTokens: after.availableTokens,
    });

    this.hooks?.emit('modelSwitched', { ...this.eventBase(), report });

    return report;
  }

  /**
   * Drop every turn. The system prompt and model are kept.
   */
  clear(): void {
    const turnsCleared = this.history.length;
    this.history = [];
    this.hooks?.emit('contextCleared', { ...this.eventBase(), turnsCleared });
  }

  stats(): ContextStats {
    const total = this.totalTokens();
    const available = this.availableTokens();

    return {
      modelName: this.modelName,
      totalTurns: this.history.length,
      totalTokens: total,
      systemPromptTokens: this.systemPromptTokens,
      availableTokens: available,
      utilizationPercentage: utilization(total, available),
      countingMethod: this.counter.method,
      maxContextTokens: this.profile.maxContextTokens,
      maxOutputTokens: this.profile.maxOutputTokens,
      reservedTokens: this.profile.reservedTokens,
    };
  }

  /**
   * Per-turn breakdown and retention history, for debugging and tuning
   */
  analytics(): ContextAnalytics {
    const stats = this.stats();
    const at = now();
    const turnsInContext = this.history.length;

    return {
      stats,
      turns: this.history.map((turn) => ({
        id: turn.id,
        role: turn.role,
        tokenCount: turn.tokenCount,
        importanceScore: turn.importanceScore,
        ageMinutes: (at - turn.timestamp) / 60000,
        provider: turn.provider,
        contentPreview: preview(turn.content),
      })),
      modelLimits: {
        maxContextTokens: this.profile.maxContextTokens,
        maxOutputTokens: this.profile.maxOutputTokens,
        availableTokens: stats.availableTokens,
        reservedTokens: this.profile.reservedTokens,
      },
      retention: {
        turnsAdded: this.turnsAdded,
        turnsInContext,
        turnsEvicted: this.turnsEvicted,
        pruningEfficiency: ((this.turnsAdded - turnsInContext) / Math.max(1, this.turnsAdded)) * 100,
      },
    };
  }

  /**
   * Retained turns in chronological order
   */
  getHistory(): ConversationTurn[] {
    return [...this.history];
  }

  getModelName(): string {
    return this.modelName;
  }

  getProfile(): ModelContextProfile {
    return { ...this.profile };
  }

  getCountingMethod(): CountingMethod {
    return this.counter.method;
  }

  getSessionId(): string {
    return this.sessionId;
  }

  private availableTokens(): number {
    return availableTokens(this.profile);
  }

  private totalTokens(): number {
    return sumTokens(this.history) + this.systemPromptTokens;
  }

  private countSystemPrompt(): number {
    return this.systemPrompt ? this.counter.count(this.systemPrompt) : 0;
  }

  private eventBase(): { sessionId: string; modelName: string; timestamp: number } {
    return { sessionId: this.sessionId, modelName: this.modelName, timestamp: now() };
  }

  private defaultCounterFactory(): TokenCounterFactory {
    return (modelName, profile) =>
      createTokenCounter(modelName, {
        encoding: profile.encoding,
        logger: this.logger,
        onFallback: (reason, error) => {
          this.hooks?.emit('counterFallback', {
            sessionId: this.sessionId,
            modelName,
            timestamp: now(),
            reason,
            error,
          });
        },
      });
  }
}
