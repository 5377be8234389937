// Main export
export { ContextStore, type ContextStoreOptions } from './context-store.js';

// Types
export type {
  TurnRole,
  MessageRole,
  ConversationTurn,
  LLMMessage,
  AnthropicPayload,
  RenderFormat,
  ModelContextProfile,
  CountingMethod,
  TokenCounter,
  TokenCounterFactory,
  AddMessageOptions,
  ContextStats,
  ContextAnalytics,
  TurnAnalysis,
  ModelSwitchReport,
} from './types.js';

// Token counting
export {
  ApproximateTokenCounter,
  TiktokenCounter,
  MAX_ENCODED_RUN,
  createTokenCounter,
  resolveEncoding,
  countMessageTokens,
  countMessagesTokens,
  type CounterFallbackReason,
  type CreateTokenCounterOptions,
} from './token-counter.js';

// Model profiles
export {
  ModelProfileRegistry,
  createDefaultProfileRegistry,
  availableTokens,
  parseProfile,
  validateProfile,
  BUILT_IN_PROFILES,
  DEFAULT_PROFILE,
  DEFAULT_RESERVED_TOKENS,
} from './model-profiles.js';

// Importance scoring
export {
  ImportanceScorer,
  DEFAULT_IMPORTANCE_WEIGHTS,
  type ImportanceWeights,
} from './importance.js';

// Retention strategies
export {
  HybridRetentionStrategy,
  RecencyRetentionStrategy,
  type RetentionStrategy,
  type RetentionStrategyOptions,
  type RetentionBudget,
  type RetentionResult,
} from './strategies/index.js';

// Hooks & Metrics
export {
  ContextHooks,
  createLogHook,
  createMetricsReporter,
  type ContextEventType,
  type ContextEventMap,
  type ContextEventListener,
  type AnyEventListener,
  type ContextMetrics,
  type SessionMetrics,
} from './hooks.js';

// Session Management
export {
  SessionManager,
  createSessionManager,
  type SessionMetadata,
  type SessionStatus,
  type SessionManagerOptions,
  type CreateSessionOptions,
  type SessionListResult,
} from './session-manager.js';

// Export/Import
export {
  exportStore,
  importStore,
  createSnapshot,
  parseSnapshot,
  SNAPSHOT_VERSION,
  type ContextSnapshot,
  type TurnSnapshot,
  type ExportOptions,
  type ImportOptions,
} from './export-import.js';

// Logging
export {
  Logger,
  LogLevel,
  createDefaultLogger,
  prettyFormat,
  jsonFormat,
  type LogEntry,
  type LoggerOptions,
  type LogFormatter,
} from './logger.js';

// Errors
export {
  AdaptiveContextError,
  ConfigurationError,
  ValidationError,
  SessionNotFoundError,
  isAdaptiveContextError,
  wrapError,
} from './errors.js';
