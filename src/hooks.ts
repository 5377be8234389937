import type { ConversationTurn, ModelSwitchReport } from './types.js';
import type { CounterFallbackReason } from './token-counter.js';
import { Logger, createDefaultLogger } from './logger.js';
import { wrapError } from './errors.js';

/**
 * Fields shared by every event
 */
export interface BaseEventPayload {
  sessionId: string;
  modelName: string;
  timestamp: number;
}

export interface TurnAddedPayload extends BaseEventPayload {
  turn: ConversationTurn;
  /** History plus system prompt tokens after pruning */
  totalTokens: number;
  availableTokens: number;
}

export interface TurnsPrunedPayload extends BaseEventPayload {
  strategy: string;
  evicted: ConversationTurn[];
  keptTurns: number;
  tokensBefore: number;
  tokensAfter: number;
  availableTokens: number;
}

/**
 * History still exceeds the budget after pruning (too few turns to evict)
 */
export interface BudgetExceededPayload extends BaseEventPayload {
  totalTokens: number;
  availableTokens: number;
  utilizationPercentage: number;
  turnCount: number;
}

export interface ModelSwitchedPayload extends BaseEventPayload {
  report: ModelSwitchReport;
}

export interface ContextClearedPayload extends BaseEventPayload {
  turnsCleared: number;
}

export interface CounterFallbackPayload extends BaseEventPayload {
  reason: CounterFallbackReason;
  error?: Error;
}

export interface ContextEventMap {
  turnAdded: TurnAddedPayload;
  turnsPruned: TurnsPrunedPayload;
  budgetExceeded: BudgetExceededPayload;
  modelSwitched: ModelSwitchedPayload;
  contextCleared: ContextClearedPayload;
  counterFallback: CounterFallbackPayload;
}

export type ContextEventType = keyof ContextEventMap;

export type ContextEventListener<T extends ContextEventType> = (payload: ContextEventMap[T]) => void;

export type AnyEventListener = (event: ContextEventType, payload: BaseEventPayload) => void;

type ListenerRegistry = { [K in ContextEventType]: Set<ContextEventListener<K>> };

type MetricUpdaters = { [K in ContextEventType]: (payload: ContextEventMap[K]) => void };

export interface SessionMetrics {
  turnsAdded: number;
  turnsEvicted: number;
  lastActivity: number;
}

export interface ContextMetrics {
  turnsAdded: number;
  turnsEvicted: number;
  pruneRuns: number;
  modelSwitches: number;
  budgetOverflows: number;
  counterFallbacks: number;
  contextsCleared: number;
  listenerErrors: number;
  /** Highest utilization percentage seen on any turn insertion */
  peakUtilization: number;
}

/**
 * Typed event hooks and in-process metrics for context stores.
 *
 * Emission is synchronous, like every store operation. A failing listener
 * is logged and counted; it never breaks the store call that emitted.
 *
 * @example
 * ```ts
 * const hooks = new ContextHooks();
 *
 * hooks.on('turnsPruned', ({ evicted, sessionId }) => {
 *   console.log(`${sessionId}: evicted ${evicted.length} turns`);
 * });
 *
 * const store = new ContextStore({ modelName: 'gpt-4o', hooks });
 * ```
 */
export class ContextHooks {
  private listeners: ListenerRegistry = {
    turnAdded: new Set(),
    turnsPruned: new Set(),
    budgetExceeded: new Set(),
    modelSwitched: new Set(),
    contextCleared: new Set(),
    counterFallback: new Set(),
  };
  private anyListeners = new Set<AnyEventListener>();
  private metrics: ContextMetrics = createInitialMetrics();
  private sessions = new Map<string, SessionMetrics>();
  private logger: Logger;

  private updaters: MetricUpdaters = {
    turnAdded: (p) => {
      this.metrics.turnsAdded++;
      const utilization = p.availableTokens > 0 ? (p.totalTokens / p.availableTokens) * 100 : 0;
      this.metrics.peakUtilization = Math.max(this.metrics.peakUtilization, utilization);
      this.updateSession(p.sessionId, 1, 0);
    },
    turnsPruned: (p) => {
      this.metrics.pruneRuns++;
      this.metrics.turnsEvicted += p.evicted.length;
      this.updateSession(p.sessionId, 0, p.evicted.length);
    },
    budgetExceeded: () => {
      this.metrics.budgetOverflows++;
    },
    modelSwitched: () => {
      this.metrics.modelSwitches++;
    },
    contextCleared: () => {
      this.metrics.contextsCleared++;
    },
    counterFallback: () => {
      this.metrics.counterFallbacks++;
    },
  };

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createDefaultLogger();
  }

  /**
   * Register an event listener
   * @returns Unsubscribe function
   */
  on<T extends ContextEventType>(event: T, listener: ContextEventListener<T>): () => void {
    const listeners = this.listeners[event];
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /**
   * Register a listener for every event
   */
  onAny(listener: AnyEventListener): () => void {
    this.anyListeners.add(listener);
    return () => {
      this.anyListeners.delete(listener);
    };
  }

  off<T extends ContextEventType>(event: T, listener: ContextEventListener<T>): void {
    this.listeners[event].delete(listener);
  }

  emit<T extends ContextEventType>(event: T, payload: ContextEventMap[T]): void {
    this.updaters[event](payload);

    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    }

    for (const listener of this.anyListeners) {
      try {
        listener(event, payload);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    }
  }

  /**
   * Number of listeners registered for an event (any-listeners included)
   */
  listenerCount(event: ContextEventType): number {
    return this.listeners[event].size + this.anyListeners.size;
  }

  getMetrics(): Readonly<ContextMetrics> & { sessionCount: number } {
    return { ...this.metrics, sessionCount: this.sessions.size };
  }

  getSessionMetrics(sessionId: string): SessionMetrics | null {
    const stats = this.sessions.get(sessionId);
    return stats ? { ...stats } : null;
  }

  /**
   * Drop the per-session metrics of a session that no longer exists
   */
  forgetSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  resetMetrics(): void {
    this.metrics = createInitialMetrics();
    this.sessions.clear();
  }

  removeAllListeners(): void {
    for (const listeners of Object.values(this.listeners)) {
      listeners.clear();
    }
    this.anyListeners.clear();
  }

  private updateSession(sessionId: string, added: number, evicted: number): void {
    const existing = this.sessions.get(sessionId) ?? { turnsAdded: 0, turnsEvicted: 0, lastActivity: 0 };
    this.sessions.set(sessionId, {
      turnsAdded: existing.turnsAdded + added,
      turnsEvicted: existing.turnsEvicted + evicted,
      lastActivity: Date.now(),
    });
  }

  private reportListenerError(event: ContextEventType, error: unknown): void {
    this.metrics.listenerErrors++;
    const wrapped = wrapError(error, `${event} listener`);
    this.logger.error(`Error in event listener for ${event}`, wrapped);
  }
}

function createInitialMetrics(): ContextMetrics {
  return {
    turnsAdded: 0,
    turnsEvicted: 0,
    pruneRuns: 0,
    modelSwitches: 0,
    budgetOverflows: 0,
    counterFallbacks: 0,
    contextsCleared: 0,
    listenerErrors: 0,
    peakUtilization: 0,
  };
}

/**
 * Listener that forwards every event to a logger at debug level
 */
export function createLogHook(logger: Logger): AnyEventListener {
  return (event, payload) => {
    logger.debug(`context ${event}`, {
      sessionId: payload.sessionId,
      modelName: payload.modelName,
      at: new Date(payload.timestamp).toISOString(),
    });
  };
}

/**
 * Periodically hand the current metrics to a reporting function
 */
export function createMetricsReporter(
  reportFn: (metrics: ReturnType<ContextHooks['getMetrics']>) => void,
  hooks: ContextHooks,
  intervalMs: number = 60000
): { start: () => void; stop: () => void } {
  let timer: ReturnType<typeof setInterval> | null = null;

  return {
    start: () => {
      if (timer) return;
      timer = setInterval(() => {
        reportFn(hooks.getMetrics());
      }, intervalMs);
      timer.unref();
    },
    stop: () => {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
