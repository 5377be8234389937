/**
 * Store Export/Import
 *
 * Serialize a store's retained context to JSON and rebuild a store from it.
 * Nothing is written anywhere: callers decide where the snapshot goes.
 */

import type { TurnRole } from './types.js';
import { ContextStore, type ContextStoreOptions } from './context-store.js';
import { ValidationError } from './errors.js';

export const SNAPSHOT_VERSION = '1.0.0';

export interface TurnSnapshot {
  role: TurnRole;
  content: string;
  provider: string;
  timestamp: number;
}

export interface ContextSnapshot {
  version: string;
  exportedAt: number;
  modelName: string;
  systemPrompt: string;
  turns: TurnSnapshot[];
}

export interface ExportOptions {
  /** Pretty print JSON (default: false) */
  prettyPrint?: boolean;
}

export interface ImportOptions extends Omit<ContextStoreOptions, 'modelName' | 'systemPrompt'> {
  /** Model for the rebuilt store (default: the snapshot's model) */
  modelName?: string;
}

/**
 * Snapshot of a store's system prompt and retained turns
 */
export function createSnapshot(store: ContextStore): ContextSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    exportedAt: Date.now(),
    modelName: store.getModelName(),
    systemPrompt: store.getSystemPrompt(),
    turns: store.getHistory().map((turn) => ({
      role: turn.role,
      content: turn.content,
      provider: turn.provider,
      timestamp: turn.timestamp,
    })),
  };
}

export function exportStore(store: ContextStore, options: ExportOptions = {}): string {
  const snapshot = createSnapshot(store);
  return options.prettyPrint ? JSON.stringify(snapshot, null, 2) : JSON.stringify(snapshot);
}

/**
 * Rebuild a store from an exported snapshot.
 *
 * Turns are replayed through addMessage, so they are recounted, rescored
 * and pruned for the target model.
 */
export function importStore(data: string, options: ImportOptions = {}): ContextStore {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ValidationError('snapshot is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const snapshot = parseSnapshot(parsed);
  const store = new ContextStore({
    ...options,
    modelName: options.modelName ?? snapshot.modelName,
    systemPrompt: snapshot.systemPrompt,
  });

  for (const turn of snapshot.turns) {
    store.addMessage(turn.role, turn.content, {
      provider: turn.provider,
      timestamp: turn.timestamp,
    });
  }

  return store;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTurnRole(value: unknown): value is TurnRole {
  return value === 'user' || value === 'assistant';
}

/**
 * Validate snapshot structure
 */
export function parseSnapshot(data: unknown): ContextSnapshot {
  if (!isRecord(data)) {
    throw new ValidationError('snapshot must be an object');
  }

  const { version, exportedAt, modelName, systemPrompt, turns } = data;

  if (typeof modelName !== 'string' || !modelName) {
    throw new ValidationError('snapshot is missing modelName');
  }
  if (typeof systemPrompt !== 'string') {
    throw new ValidationError('snapshot systemPrompt must be a string');
  }
  if (!Array.isArray(turns)) {
    throw new ValidationError('snapshot turns must be an array');
  }

  const parsedTurns = turns.map((turn: unknown, index): TurnSnapshot => {
    if (!isRecord(turn) || !isTurnRole(turn.role) || typeof turn.content !== 'string') {
      throw new ValidationError('turn is missing required fields', { index });
    }
    if (typeof turn.timestamp !== 'number' || !Number.isFinite(turn.timestamp)) {
      throw new ValidationError('turn timestamp must be a number', { index });
    }
    return {
      role: turn.role,
      content: turn.content,
      provider: typeof turn.provider === 'string' ? turn.provider : '',
      timestamp: turn.timestamp,
    };
  });

  return {
    version: typeof version === 'string' ? version : SNAPSHOT_VERSION,
    exportedAt: typeof exportedAt === 'number' ? exportedAt : 0,
    modelName,
    systemPrompt,
    turns: parsedTurns,
  };
}
