/**
 * Session Memory Store - per-thread checkpoints with LRU eviction
 */

import { LRUCache } from 'lru-cache';
import type { Turn } from '@campaign-agent/shared';
import type { SessionCheckpoint } from './models.js';

export interface SessionStoreConfig {
  /** Max threads held at once (default 500) */
  maxThreads?: number;
  /** Idle seconds before a checkpoint expires (default 3600) */
  ttlSeconds?: number;
}

export interface SessionStoreStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

/**
 * At most one checkpoint per thread; `put` overwrites.
 * A missing checkpoint is normal: it may have been evicted, expired or lost on restart.
 */
export class SessionStore<A = unknown, B = unknown> {
  private cache: LRUCache<string, SessionCheckpoint<A, B>>;
  private stats: SessionStoreStats;

  constructor(config: SessionStoreConfig = {}) {
    this.stats = {
      hits: 0,
      misses: 0,
      evictions: 0,
      size: 0,
    };

    this.cache = new LRUCache<string, SessionCheckpoint<A, B>>({
      max: config.maxThreads ?? 500,
      ttl: (config.ttlSeconds ?? 3600) * 1000,
      updateAgeOnGet: true,
      updateAgeOnHas: false,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict' || reason === 'expire') {
          this.stats.evictions++;
        }
      },
    });
  }

  get(threadId: string): SessionCheckpoint<A, B> | undefined {
    const checkpoint = this.cache.get(threadId);

    if (checkpoint) {
      this.stats.hits++;
      return structuredClone(checkpoint);
    }

    this.stats.misses++;
    return undefined;
  }

  put(threadId: string, checkpoint: SessionCheckpoint<A, B>): void {
    if (checkpoint.threadId !== threadId) {
      throw new Error(`Checkpoint for ${checkpoint.threadId} cannot be stored under ${threadId}`);
    }

    this.cache.set(threadId, structuredClone(checkpoint));
    this.stats.size = this.cache.size;
  }

  delete(threadId: string): boolean {
    const deleted = this.cache.delete(threadId);
    this.stats.size = this.cache.size;
    return deleted;
  }

  clear(): void {
    this.cache.clear();
    this.stats = {
      hits: 0,
      misses: 0,
      evictions: 0,
      size: 0,
    };
  }

  getStats(): SessionStoreStats {
    return {
      ...this.stats,
      size: this.cache.size,
    };
  }

  get size(): number {
    return this.cache.size;
  }
}

/**
 * Derive a degraded checkpoint from persisted turns after the live one was lost.
 * Analysis and retrieved data cannot be recovered, only the conversation text.
 */
export function rebuildCheckpoint<A = unknown, B = unknown>(
  threadId: string,
  turns: Turn[]
): SessionCheckpoint<A, B> {
  const last = turns[turns.length - 1];

  return {
    threadId,
    lastAnalysis: null,
    lastBundle: null,
    step: 'Done',
    turnCursor: last ? last.turn_id : 0,
    recentTurns: structuredClone(turns),
    updatedAt: new Date().toISOString(),
    degraded: true,
  };
}
