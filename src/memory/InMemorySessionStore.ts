import { LRUCache } from 'lru-cache';
import type { ContextLookup, SessionContext, SessionContextStore } from '@/memory/SessionStore';
import type { ContextValue, ContextVariables } from '@/pipeline/types';
import { logger } from '@/services/logger';

interface SessionEntry {
  variables: ContextVariables;
  createdAt: string;
  updatedAt: string;
}

/**
 * Process-local store. Entries expire after the TTL of inactivity; the oldest are evicted past `maxSessions`.
 * Pinned sessions live in `pinned` as well, so eviction from the cache cannot lose a run's context.
 */
export class InMemorySessionStore implements SessionContextStore {
  private readonly memory: LRUCache<string, SessionEntry>;
  private readonly pinned = new Map<string, { entry: SessionEntry; holders: number }>();

  constructor(ttlMinutes: number = 30, maxSessions: number = 1000) {
    this.memory = new LRUCache<string, SessionEntry>({
      max: maxSessions,
      ttl: ttlMinutes * 60 * 1000,
      updateAgeOnGet: true,
      dispose: (_entry, sessionId, reason) => {
        if (reason === 'evict' || reason === 'expire') {
          logger.debug('sessions:evicted', { sessionId, reason });
        }
      },
    });
  }

  private lookup(sessionId: string): SessionEntry | undefined {
    return this.pinned.get(sessionId)?.entry ?? this.memory.get(sessionId);
  }

  private entry(sessionId: string): SessionEntry {
    const existing = this.lookup(sessionId);
    if (existing) return existing;
    const now = new Date().toISOString();
    const created: SessionEntry = { variables: {}, createdAt: now, updatedAt: now };
    this.memory.set(sessionId, created);
    return created;
  }

  async getOrCreate(sessionId: string): Promise<SessionContext> {
    const entry = this.entry(sessionId);
    return {
      sessionId,
      variables: structuredClone(entry.variables),
      createdAt: entry.createdAt,
      updatedAt: entry.updatedAt,
    };
  }

  async get(sessionId: string, key: string): Promise<ContextLookup> {
    const entry = this.lookup(sessionId);
    if (!entry || !Object.prototype.hasOwnProperty.call(entry.variables, key)) return { found: false };
    return { found: true, value: structuredClone(entry.variables[key]) };
  }

  async set(sessionId: string, key: string, value: ContextValue): Promise<void> {
    await this.merge(sessionId, { [key]: value });
  }

  async merge(sessionId: string, values: ContextVariables): Promise<void> {
    const entry = this.entry(sessionId);
    for (const [key, value] of Object.entries(values)) {
      entry.variables[key] = structuredClone(value);
    }
    entry.updatedAt = new Date().toISOString();
  }

  async delete(sessionId: string): Promise<void> {
    this.pinned.delete(sessionId);
    this.memory.delete(sessionId);
  }

  async acquire(sessionId: string): Promise<void> {
    const pin = this.pinned.get(sessionId);
    if (pin) {
      pin.holders += 1;
      return;
    }
    this.pinned.set(sessionId, { entry: this.entry(sessionId), holders: 1 });
  }

  async release(sessionId: string): Promise<void> {
    const pin = this.pinned.get(sessionId);
    if (!pin) return;
    pin.holders -= 1;
    if (pin.holders > 0) return;
    this.pinned.delete(sessionId);
    // Back under cache control with a fresh TTL.
    this.memory.set(sessionId, pin.entry);
  }

  isAvailable(): boolean {
    return true;
  }

  size(): number {
    return new Set([...this.memory.keys(), ...this.pinned.keys()]).size;
  }

  async close(): Promise<void> {
    this.pinned.clear();
    this.memory.clear();
  }
}
