import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ContextStore } from '../src/context-store.js';
import { ContextHooks } from '../src/hooks.js';
import { ModelProfileRegistry } from '../src/model-profiles.js';
import { RecencyRetentionStrategy } from '../src/strategies/index.js';
import { Logger, LogLevel } from '../src/logger.js';
import type { CountingMethod, TokenCounter, TokenCounterFactory } from '../src/types.js';

// tiny leaves 50 tokens for history, roomy leaves 1000
const profiles = new ModelProfileRegistry({
  tiny: { maxContextTokens: 100, maxOutputTokens: 30, reservedTokens: 20 },
  roomy: { maxContextTokens: 2000, maxOutputTokens: 800, reservedTokens: 200 },
});

const silent = new Logger({ level: LogLevel.SILENT });

/** 40 characters, 10 tokens under approximate counting */
const tenTokens = (label: string): string => label.padEnd(40, '.');

class RatioCounter implements TokenCounter {
  readonly method: CountingMethod = 'approximate';
  constructor(private charsPerToken: number) {}

  count(text: string): number {
    return Math.floor(text.length / this.charsPerToken);
  }
}

function createStore(modelName = 'tiny', extra: { hooks?: ContextHooks; systemPrompt?: string } = {}): ContextStore {
  return new ContextStore({ modelName, profiles, logger: silent, ...extra });
}

/** Six 10-token turns, alternating user and assistant */
function fillConversation(store: ContextStore, turns = 6): void {
  for (let i = 0; i < turns; i++) {
    store.addMessage(i % 2 === 0 ? 'user' : 'assistant', tenTokens(`turn ${i}`));
  }
}

const sequences = (store: ContextStore): number[] => store.getHistory().map((t) => t.sequence);

describe('ContextStore', () => {
  describe('addMessage', () => {
    it('should store a scored, counted turn', () => {
      const store = createStore();
      const turn = store.addMessage('user', tenTokens('hello'), { provider: 'groq' });

      expect(turn.sequence).toBe(0);
      expect(turn.role).toBe('user');
      expect(turn.tokenCount).toBe(10);
      expect(turn.importanceScore).toBeCloseTo(1.2);
      expect(turn.provider).toBe('groq');
      expect(turn.id).toMatch(/^turn_/);
      expect(store.getHistory()).toEqual([turn]);
    });

    it('should default the provider to an empty string', () => {
      const store = createStore();

      expect(store.addMessage('assistant', 'hi').provider).toBe('');
    });

    it('should accept empty content', () => {
      const store = createStore();
      const turn = store.addMessage('user', '');

      expect(turn.tokenCount).toBe(1);
      expect(store.stats().totalTurns).toBe(1);
    });

    it('should use a timestamp override', () => {
      const store = createStore();

      expect(store.addMessage('user', 'hi', { timestamp: 1234 }).timestamp).toBe(1234);
    });
  });

  describe('pruning', () => {
    it('should keep the history within the available budget', () => {
      const store = createStore();

      for (let i = 0; i < 20; i++) {
        store.addMessage(i % 2 === 0 ? 'user' : 'assistant', tenTokens(`turn ${i}`));
        expect(store.stats().totalTokens).toBeLessThanOrEqual(50);
      }
    });

    it('should evict the lowest-scoring older turn first', () => {
      const store = createStore();
      fillConversation(store);

      expect(sequences(store)).toEqual([0, 2, 3, 4, 5]);
      expect(store.stats().totalTokens).toBe(50);
    });

    it('should always retain the two most recent turns', () => {
      const store = createStore();
      fillConversation(store);
      store.addMessage('user', 'ok');

      expect(sequences(store)).toEqual([0, 2, 4, 5, 6]);
      expect(store.stats().totalTokens).toBe(41);
    });

    it('should keep the history in chronological order', () => {
      const store = createStore();
      fillConversation(store, 12);

      const history = sequences(store);
      expect(history).toEqual([...history].sort((a, b) => a - b));
    });

    it('should keep oversized recent turns and report the overflow', () => {
      const hooks = new ContextHooks({ logger: silent });
      const exceeded = vi.fn();
      hooks.on('budgetExceeded', exceeded);

      const store = createStore('tiny', { hooks });
      store.addMessage('user', 'x'.repeat(400));

      expect(store.stats().totalTurns).toBe(1);
      expect(store.stats().utilizationPercentage).toBe(200);
      expect(exceeded).toHaveBeenCalledOnce();
      expect(exceeded.mock.calls[0]?.[0]).toMatchObject({
        totalTokens: 100,
        availableTokens: 50,
        utilizationPercentage: 200,
        turnCount: 1,
      });
    });

    it('should use the configured strategy', () => {
      const store = new ContextStore({
        modelName: 'tiny',
        profiles,
        logger: silent,
        strategy: new RecencyRetentionStrategy(),
      });
      fillConversation(store);

      expect(sequences(store)).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('render', () => {
    it('should render messages with the system prompt first', () => {
      const store = createStore('roomy', { systemPrompt: 'S' });
      store.addMessage('user', 'hi');
      store.addMessage('assistant', 'hello');

      expect(store.render()).toEqual([
        { role: 'system', content: 'S' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ]);
      expect(store.render('messages')).toEqual(store.renderMessages());
    });

    it('should omit an empty system prompt', () => {
      const store = createStore('roomy');
      store.addMessage('user', 'hi');

      expect(store.render('messages')).toEqual([{ role: 'user', content: 'hi' }]);
      expect(store.render('anthropic')).toEqual({ messages: [{ role: 'user', content: 'hi' }] });
    });

    it('should render a labeled transcript', () => {
      const store = createStore('roomy', { systemPrompt: 'S' });
      store.addMessage('user', 'hi');
      store.addMessage('assistant', 'hello');

      expect(store.render('text')).toBe('System: S\n\nConversation context:\nUser: hi\nAssistant: hello');
    });

    it('should render an empty store as an empty transcript', () => {
      expect(createStore('roomy').render('text')).toBe('');
    });

    it('should separate the system prompt for anthropic', () => {
      const store = createStore('roomy', { systemPrompt: 'S' });
      store.addMessage('user', 'hi');

      expect(store.render('anthropic')).toEqual({
        system: 'S',
        messages: [{ role: 'user', content: 'hi' }],
      });
    });
  });

  describe('switchModel', () => {
    const counterFactory: TokenCounterFactory = (modelName) =>
      new RatioCounter(modelName === 'tiny' ? 2 : 4);

    it('should recount and prune for the new budget', () => {
      const store = new ContextStore({ modelName: 'roomy', profiles, logger: silent, counterFactory });
      fillConversation(store);

      const report = store.switchModel('tiny');

      expect(report).toMatchObject({
        previousModel: 'roomy',
        newModel: 'tiny',
        turnsBefore: 6,
        turnsAfter: 2,
        tokensBefore: 60,
        tokensAfter: 40,
      });
      expect(report.utilizationBefore).toBeCloseTo(6);
      expect(report.utilizationAfter).toBeCloseTo(80);
      expect(sequences(store)).toEqual([4, 5]);
      expect(store.getHistory().map((t) => t.tokenCount)).toEqual([20, 20]);
      expect(store.getModelName()).toBe('tiny');
      expect(store.stats().availableTokens).toBe(50);
    });

    it('should recompute importance with the new counts', () => {
      const store = new ContextStore({
        modelName: 'roomy',
        profiles,
        logger: silent,
        counterFactory: (modelName) => (modelName === 'roomy' ? new RatioCounter(4) : new RatioCounter(40)),
      });
      store.addMessage('user', tenTokens('remember this'));
      expect(store.getHistory()[0]?.importanceScore).toBeCloseTo(1.2);

      store.switchModel('coarse');

      expect(store.getHistory()[0]?.tokenCount).toBe(1);
      expect(store.getHistory()[0]?.importanceScore).toBeCloseTo(0.96);
    });

    it('should keep turn identity across a switch', () => {
      const store = createStore('roomy');
      const turn = store.addMessage('user', 'hi');
      store.switchModel('tiny');

      expect(store.getHistory()[0]?.id).toBe(turn.id);
      expect(store.getHistory()[0]?.sequence).toBe(0);
    });

    it('should use the default profile for unknown models', () => {
      const store = createStore('roomy');
      store.switchModel('mystery-model');

      expect(store.getProfile()).toEqual({ maxContextTokens: 4096, maxOutputTokens: 1000, reservedTokens: 200 });
    });

    it('should resolve a blank model name to the default profile', () => {
      const store = createStore();
      store.addMessage('user', 'hi');
      const report = store.switchModel('  ');

      expect(report.newModel).toBe('  ');
      expect(store.getProfile()).toEqual({ maxContextTokens: 4096, maxOutputTokens: 1000, reservedTokens: 200 });
      expect(store.stats().totalTurns).toBe(1);
    });

    it('should log the switch', () => {
      const lines: string[] = [];
      const logger = new Logger({ level: LogLevel.INFO, output: (line) => lines.push(line), timestamps: false });
      const store = new ContextStore({ modelName: 'roomy', profiles, logger, counterFactory });
      store.switchModel('tiny');

      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('Context optimized for tiny (was roomy)');
    });
  });

  describe('setSystemPrompt', () => {
    it('should count the prompt and re-prune', () => {
      const store = createStore();
      fillConversation(store, 5);
      expect(store.stats().totalTokens).toBe(50);

      store.setSystemPrompt(tenTokens('P'));

      expect(store.getSystemPrompt()).toBe(tenTokens('P'));
      expect(sequences(store)).toEqual([0, 2, 3, 4]);
      expect(store.stats()).toMatchObject({ systemPromptTokens: 10, totalTokens: 50 });
    });
  });

  describe('clear', () => {
    it('should drop every turn but keep prompt and model', () => {
      const store = createStore('tiny', { systemPrompt: 'S'.padEnd(20, '.') });
      fillConversation(store, 3);
      store.clear();

      expect(store.getHistory()).toEqual([]);
      expect(store.getSystemPrompt()).toBe('S'.padEnd(20, '.'));
      expect(store.stats()).toMatchObject({ totalTurns: 0, totalTokens: 5, modelName: 'tiny' });
    });
  });

  describe('stats', () => {
    it('should report budget figures', () => {
      const store = createStore('tiny', { systemPrompt: 'S'.padEnd(20, '.') });
      store.addMessage('user', tenTokens('hi'));

      const stats = store.stats();

      expect(stats.utilizationPercentage).toBeCloseTo(30);
      expect(stats).toMatchObject({
        modelName: 'tiny',
        totalTurns: 1,
        totalTokens: 15,
        systemPromptTokens: 5,
        availableTokens: 50,
        countingMethod: 'approximate',
        maxContextTokens: 100,
        maxOutputTokens: 30,
        reservedTokens: 20,
      });
    });

    it('should count precisely for models with a known tokenizer', () => {
      const store = new ContextStore({ modelName: 'gpt-4o', logger: silent });

      expect(store.addMessage('user', 'hello world').tokenCount).toBe(2);
      expect(store.getCountingMethod()).toBe('tiktoken');
    });
  });

  describe('analytics', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should describe retained turns and retention history', () => {
      const store = createStore();
      store.addMessage('user', tenTokens('first'), { timestamp: Date.now() - 120000, provider: 'groq' });
      fillConversation(store, 5);

      const analytics = store.analytics();

      expect(analytics.stats.totalTurns).toBe(5);
      expect(analytics.retention.turnsAdded).toBe(6);
      expect(analytics.retention.turnsInContext).toBe(5);
      expect(analytics.retention.turnsEvicted).toBe(1);
      expect(analytics.retention.pruningEfficiency).toBeCloseTo(16.667, 2);
      expect(analytics.modelLimits).toEqual({
        maxContextTokens: 100,
        maxOutputTokens: 30,
        availableTokens: 50,
        reservedTokens: 20,
      });
      expect(analytics.turns[0]).toMatchObject({
        role: 'user',
        tokenCount: 10,
        ageMinutes: 2,
        provider: 'groq',
        contentPreview: tenTokens('first'),
      });
    });

    it('should truncate long previews', () => {
      const store = createStore('roomy');
      store.addMessage('user', 'a'.repeat(60));

      expect(store.analytics().turns[0]?.contentPreview).toBe(`${'a'.repeat(50)}...`);
    });
  });

  describe('hooks', () => {
    it('should emit turn and prune events', () => {
      const hooks = new ContextHooks({ logger: silent });
      const events: string[] = [];
      hooks.onAny((event) => events.push(event));
      const pruned = vi.fn();
      hooks.on('turnsPruned', pruned);

      const store = createStore('tiny', { hooks });
      fillConversation(store);

      expect(events).toEqual([
        'counterFallback',
        'turnAdded',
        'turnAdded',
        'turnAdded',
        'turnAdded',
        'turnAdded',
        'turnsPruned',
        'turnAdded',
      ]);
      expect(pruned.mock.calls[0]?.[0]).toMatchObject({
        sessionId: store.getSessionId(),
        modelName: 'tiny',
        strategy: 'hybrid',
        keptTurns: 5,
        tokensBefore: 60,
        tokensAfter: 50,
        availableTokens: 50,
      });
      expect(hooks.getMetrics()).toMatchObject({ turnsAdded: 6, turnsEvicted: 1, pruneRuns: 1 });
    });

    it('should emit switch and clear events', () => {
      const hooks = new ContextHooks({ logger: silent });
      const store = createStore('roomy', { hooks });
      store.addMessage('user', 'hi');
      store.switchModel('tiny');
      store.clear();

      expect(hooks.getMetrics()).toMatchObject({ modelSwitches: 1, contextsCleared: 1 });
    });

    it('should survive a failing listener', () => {
      const hooks = new ContextHooks({ logger: silent });
      hooks.on('turnAdded', () => {
        throw new Error('boom');
      });

      const store = createStore('tiny', { hooks });
      const turn = store.addMessage('user', 'hi');

      expect(store.getHistory()).toEqual([turn]);
      expect(hooks.getMetrics().listenerErrors).toBe(1);
    });
  });

  describe('configuration', () => {
    it('should give an empty model name the default profile', () => {
      const store = new ContextStore({ modelName: '', logger: silent });

      expect(store.getModelName()).toBe('');
      expect(store.stats().availableTokens).toBe(2896);
      expect(store.getCountingMethod()).toBe('approximate');
    });

    it('should default to the default profile', () => {
      const store = new ContextStore({ logger: silent });

      expect(store.getModelName()).toBe('default');
      expect(store.stats().availableTokens).toBe(2896);
    });

    it('should use the given session id', () => {
      expect(new ContextStore({ sessionId: 'abc', logger: silent }).getSessionId()).toBe('abc');
    });

    it('should keep stores independent', () => {
      const a = createStore();
      const b = createStore();
      a.addMessage('user', 'only in a');

      expect(b.getHistory()).toEqual([]);
    });
  });
});
