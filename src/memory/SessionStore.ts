// Session context store interface
import type { ContextValue, ContextVariables } from '@/pipeline/types';

export interface SessionContext {
  sessionId: string;
  variables: ContextVariables;
  createdAt: string;
  updatedAt: string;
}

export type ContextLookup = { found: true; value: ContextValue } | { found: false };

/**
 * Named sessions of variables. Writes are visible to the next read of the same
 * session. Concurrent runs on one session are last-write-wins per key.
 */
export interface SessionContextStore {
  /** Returns a snapshot; mutating it does not change the stored session. */
  getOrCreate(sessionId: string): Promise<SessionContext>;
  get(sessionId: string, key: string): Promise<ContextLookup>;
  set(sessionId: string, key: string, value: ContextValue): Promise<void>;
  /** Later values overwrite earlier ones. */
  merge(sessionId: string, values: ContextVariables): Promise<void>;
  delete(sessionId: string): Promise<void>;
  /**
   * Creates the session if needed and pins it: a pinned session is neither
   * evicted nor expired until every `acquire` has been matched by `release`.
   */
  acquire(sessionId: string): Promise<void>;
  release(sessionId: string): Promise<void>;
  isAvailable(): boolean;
  close(): Promise<void>;
}

export function isContextValue(value: unknown): value is ContextValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isContextValue);
      return Object.values(value).every((v) => v === undefined || isContextValue(v));
    default:
      return false;
  }
}
