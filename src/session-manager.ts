/**
 * Session Management
 *
 * Gives every conversation session its own ContextStore, with TTL expiry,
 * idle tracking and periodic cleanup. Stores never share state.
 *
 * @example
 * ```typescript
 * import { SessionManager } from 'adaptive-context';
 *
 * const sessions = new SessionManager({
 *   defaultTTL: 24 * 60 * 60 * 1000, // 24 hours
 *   storeDefaults: { modelName: 'llama3-70b-8192' },
 * });
 *
 * const context = sessions.getOrCreate(request.sessionId, {
 *   systemPrompt: 'You are a friendly assistant.',
 * });
 * context.addMessage('user', request.text);
 * ```
 */

import type { ContextStats } from './types.js';
import { ContextStore, type ContextStoreOptions } from './context-store.js';
import { SessionNotFoundError } from './errors.js';
import { Logger, createDefaultLogger } from './logger.js';

export type SessionStatus = 'active' | 'idle' | 'expired';

export interface SessionMetadata {
  /** Session creation timestamp */
  createdAt: number;
  /** Last activity timestamp */
  lastActivityAt: number;
  /** Session expiry timestamp (null = never expires) */
  expiresAt: number | null;
  /** Lifetime renewed on each activity (null = never expires) */
  ttl: number | null;
  /** Custom user data */
  userData?: Record<string, unknown>;
  /** Session tags for categorization */
  tags?: string[];
  status: SessionStatus;
}

export interface SessionManagerOptions {
  /** Default TTL for new sessions in milliseconds (null = never expires) */
  defaultTTL?: number | null;
  /** Cleanup interval in milliseconds (default: 1 hour) */
  cleanupInterval?: number;
  /** Whether to auto-start cleanup timer (default: true) */
  autoCleanup?: boolean;
  /** Callback when session expires */
  onSessionExpired?: (sessionId: string, metadata: SessionMetadata) => void;
  /** Maximum idle time before marking as idle (default: 5 minutes) */
  idleThreshold?: number;
  /** Options applied to every store this manager creates */
  storeDefaults?: Omit<ContextStoreOptions, 'sessionId'>;
  logger?: Logger;
}

export interface CreateSessionOptions {
  ttl?: number | null;
  modelName?: string;
  systemPrompt?: string;
  userData?: Record<string, unknown>;
  tags?: string[];
}

export interface SessionListResult {
  sessionId: string;
  metadata: SessionMetadata;
  stats: ContextStats;
}

interface SessionEntry {
  store: ContextStore;
  metadata: SessionMetadata;
}

export class SessionManager {
  private sessions = new Map<string, SessionEntry>();
  private defaultTTL: number | null;
  private cleanupInterval: number;
  private cleanupTimer?: ReturnType<typeof setInterval>;
  private onSessionExpired?: (sessionId: string, metadata: SessionMetadata) => void;
  private idleThreshold: number;
  private storeDefaults: Omit<ContextStoreOptions, 'sessionId'>;
  private logger: Logger;

  constructor(options: SessionManagerOptions = {}) {
    this.defaultTTL = options.defaultTTL ?? null;
    this.cleanupInterval = options.cleanupInterval ?? 60 * 60 * 1000; // 1 hour
    this.onSessionExpired = options.onSessionExpired;
    this.idleThreshold = options.idleThreshold ?? 5 * 60 * 1000; // 5 minutes
    this.storeDefaults = options.storeDefaults ?? {};
    this.logger = options.logger ?? this.storeDefaults.logger ?? createDefaultLogger();

    if (options.autoCleanup !== false) {
      this.startCleanup();
    }
  }

  /**
   * Create a session with a fresh store, replacing any existing one
   */
  create(sessionId: string, options: CreateSessionOptions = {}): ContextStore {
    const now = Date.now();
    const ttl = options.ttl !== undefined ? options.ttl : this.defaultTTL;
    this.forget(sessionId);

    const store = new ContextStore({
      ...this.storeDefaults,
      modelName: options.modelName ?? this.storeDefaults.modelName,
      systemPrompt: options.systemPrompt ?? this.storeDefaults.systemPrompt,
      sessionId,
    });

    this.sessions.set(sessionId, {
      store,
      metadata: {
        createdAt: now,
        lastActivityAt: now,
        expiresAt: ttl ? now + ttl : null,
        ttl: ttl || null,
        userData: options.userData,
        tags: options.tags,
        status: 'active',
      },
    });

    this.logger.debug('Session created', { sessionId, modelName: store.getModelName() });
    return store;
  }

  /**
   * Store of a live session, or a new session when it is missing or expired.
   * Reusing a session counts as activity.
   */
  getOrCreate(sessionId: string, options: CreateSessionOptions = {}): ContextStore {
    const entry = this.sessions.get(sessionId);
    if (entry && !this.isExpired(sessionId)) {
      this.touch(sessionId, { ttl: options.ttl ?? undefined });
      return entry.store;
    }

    if (entry) {
      this.expireEntry(sessionId, entry);
    }
    return this.create(sessionId, options);
  }

  /**
   * Store of a live session
   */
  get(sessionId: string): ContextStore | undefined {
    if (this.isExpired(sessionId)) return undefined;
    return this.sessions.get(sessionId)?.store;
  }

  /**
   * Store of a live session, throwing when there is none
   */
  require(sessionId: string): ContextStore {
    const store = this.get(sessionId);
    if (!store) {
      throw new SessionNotFoundError(sessionId);
    }
    return store;
  }

  has(sessionId: string): boolean {
    return this.get(sessionId) !== undefined;
  }

  getMetadata(sessionId: string): SessionMetadata | null {
    const entry = this.sessions.get(sessionId);
    if (!entry) return null;
    this.updateStatus(entry.metadata);
    return { ...entry.metadata };
  }

  /**
   * Record activity on a session, renewing its expiry.
   * Sessions without a TTL stay unexpiring unless a ttl is given.
   */
  touch(sessionId: string, options: { ttl?: number } = {}): SessionMetadata | null {
    const entry = this.sessions.get(sessionId);
    if (!entry) return null;

    const now = Date.now();
    const metadata = entry.metadata;
    metadata.lastActivityAt = now;
    metadata.status = 'active';

    if (options.ttl) {
      metadata.ttl = options.ttl;
    }
    if (metadata.ttl) {
      metadata.expiresAt = now + metadata.ttl;
    }

    return { ...metadata };
  }

  /**
   * Remove a session and its store
   */
  delete(sessionId: string): boolean {
    this.forget(sessionId);
    return this.sessions.delete(sessionId);
  }

  isExpired(sessionId: string): boolean {
    const metadata = this.sessions.get(sessionId)?.metadata;
    if (!metadata || metadata.expiresAt === null) return false;
    return Date.now() > metadata.expiresAt;
  }

  /**
   * Get time until session expires (in milliseconds)
   */
  getTimeToLive(sessionId: string): number | null {
    const metadata = this.sessions.get(sessionId)?.metadata;
    if (!metadata || metadata.expiresAt === null) return null;
    return Math.max(0, metadata.expiresAt - Date.now());
  }

  /**
   * Sessions with their current context statistics
   */
  list(options: { status?: SessionStatus; tags?: string[]; limit?: number } = {}): SessionListResult[] {
    const results: SessionListResult[] = [];
    const wantedTags = options.tags ?? [];

    for (const [sessionId, entry] of this.sessions) {
      const metadata = entry.metadata;
      this.updateStatus(metadata);

      if (options.status && metadata.status !== options.status) continue;

      if (wantedTags.length > 0) {
        const tags = metadata.tags ?? [];
        if (!wantedTags.some((tag) => tags.includes(tag))) continue;
      }

      results.push({ sessionId, metadata: { ...metadata }, stats: entry.store.stats() });

      if (options.limit && results.length >= options.limit) break;
    }

    return results;
  }

  /**
   * Number of sessions, expired ones not yet cleaned up included
   */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Remove expired sessions
   * @returns The removed session ids
   */
  cleanup(): string[] {
    const cleaned: string[] = [];

    for (const [sessionId, entry] of this.sessions) {
      if (this.isExpired(sessionId)) {
        this.expireEntry(sessionId, entry);
        cleaned.push(sessionId);
      }
    }

    if (cleaned.length > 0) {
      this.logger.debug('Expired sessions removed', { count: cleaned.length });
    }

    return cleaned;
  }

  /**
   * Start automatic cleanup timer
   */
  startCleanup(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.cleanupInterval);

    // Prevent timer from keeping process alive
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  /**
   * Stop the cleanup timer and drop every session
   */
  destroy(): void {
    this.stopCleanup();
    for (const sessionId of this.sessions.keys()) {
      this.forget(sessionId);
    }
    this.sessions.clear();
  }

  private expireEntry(sessionId: string, entry: SessionEntry): void {
    entry.metadata.status = 'expired';
    this.onSessionExpired?.(sessionId, { ...entry.metadata });
    this.forget(sessionId);
    this.sessions.delete(sessionId);
  }

  private forget(sessionId: string): void {
    this.storeDefaults.hooks?.forgetSession(sessionId);
  }

  private updateStatus(metadata: SessionMetadata): void {
    const now = Date.now();

    if (metadata.expiresAt !== null && now > metadata.expiresAt) {
      metadata.status = 'expired';
    } else if (now - metadata.lastActivityAt > this.idleThreshold) {
      metadata.status = 'idle';
    } else {
      metadata.status = 'active';
    }
  }
}

/**
 * Create a session manager with common presets
 */
export function createSessionManager(
  preset: 'development' | 'production' | 'aggressive' = 'production',
  storeDefaults: Omit<ContextStoreOptions, 'sessionId'> = {}
): SessionManager {
  const presets: Record<'development' | 'production' | 'aggressive', SessionManagerOptions> = {
    development: {
      defaultTTL: null, // Never expires
      autoCleanup: false,
    },
    production: {
      defaultTTL: 24 * 60 * 60 * 1000, // 24 hours
      cleanupInterval: 60 * 60 * 1000, // 1 hour
      idleThreshold: 30 * 60 * 1000, // 30 minutes
    },
    aggressive: {
      defaultTTL: 2 * 60 * 60 * 1000, // 2 hours
      cleanupInterval: 15 * 60 * 1000, // 15 minutes
      idleThreshold: 5 * 60 * 1000, // 5 minutes
    },
  };

  return new SessionManager({ ...presets[preset], storeDefaults });
}
