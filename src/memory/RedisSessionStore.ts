// src/memory/RedisSessionStore.ts

import { isContextValue, type ContextLookup, type SessionContext, type SessionContextStore } from '@/memory/SessionStore';
import type { ContextValue, ContextVariables } from '@/pipeline/types';
import { logger } from '@/services/logger';

const META_CREATED = '__createdAt';
const META_UPDATED = '__updatedAt';
const VAR_PREFIX = 'v:';

export type MultiReply = [error: Error | null, result: unknown][] | null;

/** The MULTI commands the store queues; ioredis' ChainableCommander satisfies it. */
export interface SessionMulti {
  hsetnx(key: string, field: string, value: string): SessionMulti;
  hset(key: string, fields: Record<string, string>): SessionMulti;
  expire(key: string, seconds: number): SessionMulti;
  persist(key: string): SessionMulti;
  exec(): Promise<MultiReply>;
}

/** The subset of an ioredis client the store uses. */
export interface SessionRedisClient {
  readonly status: string;
  multi(): SessionMulti;
  hgetall(key: string): Promise<Record<string, string>>;
  hget(key: string, field: string): Promise<string | null>;
  del(key: string): Promise<number>;
  connect(): Promise<void>;
  ping(): Promise<string>;
  quit(): Promise<string>;
  disconnect(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'ready' | 'close', listener: () => void): unknown;
}

/**
 * Redis-backed session store. One hash per session: each variable is a JSON
 * encoded field, the whole hash expires after the TTL of inactivity.
 * Sessions pinned by this process are PERSISTed instead of given a TTL.
 */
export class RedisSessionStore implements SessionContextStore {
  private readonly ttl: number;
  private readonly keyPrefix: string = 'session:';
  private connected = false;
  private readonly pins = new Map<string, number>();

  constructor(private readonly client: SessionRedisClient, ttlMinutes: number = 30) {
    this.ttl = Math.max(1, Math.round(ttlMinutes * 60)); // Redis TTL is in seconds

    this.client.on('error', (err: Error) => {
      logger.error('sessions:redis_error', { error: err.message });
      this.connected = false;
    });
    this.client.on('ready', () => {
      this.connected = true;
    });
    this.client.on('close', () => {
      logger.warn('sessions:redis_closed');
      this.connected = false;
    });
  }

  async connect(): Promise<void> {
    if (this.client.status === 'wait') {
      await this.client.connect();
    }
    await this.client.ping();
    this.connected = true;
  }

  /** MULTI replies carry per-command errors; surface the first one. */
  private async exec(pending: Promise<MultiReply>): Promise<void> {
    const results = await pending;
    for (const [err] of results ?? []) {
      if (err) throw err;
    }
  }

  private getKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  /** Refreshes the TTL, or keeps the key persistent while the session is pinned. */
  private keepAlive(multi: SessionMulti, sessionId: string): SessionMulti {
    const key = this.getKey(sessionId);
    return this.pins.has(sessionId) ? multi.persist(key) : multi.expire(key, this.ttl);
  }

  private decode(sessionId: string, field: string, raw: string): ContextValue | undefined {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isContextValue(parsed)) return parsed;
    } catch (err) {
      logger.warn('sessions:redis_decode_failed', {
        sessionId,
        field,
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
    logger.warn('sessions:redis_non_json_value', { sessionId, field });
    return undefined;
  }

  async getOrCreate(sessionId: string): Promise<SessionContext> {
    const key = this.getKey(sessionId);
    const now = new Date().toISOString();
    await this.exec(
      this.keepAlive(this.client.multi().hsetnx(key, META_CREATED, now).hsetnx(key, META_UPDATED, now), sessionId).exec(),
    );

    const hash = await this.client.hgetall(key);
    const variables: ContextVariables = {};
    for (const [field, raw] of Object.entries(hash)) {
      if (!field.startsWith(VAR_PREFIX)) continue;
      const name = field.slice(VAR_PREFIX.length);
      const value = this.decode(sessionId, name, raw);
      if (value !== undefined) variables[name] = value;
    }
    return {
      sessionId,
      variables,
      createdAt: hash[META_CREATED] ?? now,
      updatedAt: hash[META_UPDATED] ?? now,
    };
  }

  async get(sessionId: string, key: string): Promise<ContextLookup> {
    const raw = await this.client.hget(this.getKey(sessionId), `${VAR_PREFIX}${key}`);
    if (raw === null) return { found: false };
    const value = this.decode(sessionId, key, raw);
    return value === undefined ? { found: false } : { found: true, value };
  }

  async set(sessionId: string, key: string, value: ContextValue): Promise<void> {
    await this.merge(sessionId, { [key]: value });
  }

  async merge(sessionId: string, values: ContextVariables): Promise<void> {
    const key = this.getKey(sessionId);
    const now = new Date().toISOString();
    const fields: Record<string, string> = { [META_UPDATED]: now };
    for (const [name, value] of Object.entries(values)) {
      fields[`${VAR_PREFIX}${name}`] = JSON.stringify(value);
    }
    await this.exec(this.keepAlive(this.client.multi().hsetnx(key, META_CREATED, now).hset(key, fields), sessionId).exec());
  }

  async delete(sessionId: string): Promise<void> {
    this.pins.delete(sessionId);
    await this.client.del(this.getKey(sessionId));
  }

  async acquire(sessionId: string): Promise<void> {
    this.pins.set(sessionId, (this.pins.get(sessionId) ?? 0) + 1);
    await this.getOrCreate(sessionId);
  }

  async release(sessionId: string): Promise<void> {
    const holders = (this.pins.get(sessionId) ?? 0) - 1;
    if (holders > 0) {
      this.pins.set(sessionId, holders);
      return;
    }
    if (!this.pins.delete(sessionId)) return;
    await this.exec(this.client.multi().expire(this.getKey(sessionId), this.ttl).exec());
  }

  isAvailable(): boolean {
    return this.connected;
  }

  async close(): Promise<void> {
    this.pins.clear();
    await this.client.quit();
    this.connected = false;
  }
}
