/**
 * Data models for the conversation memory layers
 */

import type { Turn } from '@campaign-agent/shared';

/**
 * Thread model - one user's ongoing conversation
 */
export interface Thread {
  thread_id: string;
  user_id: string | null;
  created_at: string;
}

/**
 * Token usage ledger entry, one per processed query
 */
export interface TokenUsageRecord {
  id: number;
  user_id: string;
  thread_id: string;
  query_id: string;
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  created_at: string;
}

/**
 * Filter interfaces for queries
 */

export interface ListRecentOptions {
  /** Include table/chart/error turns, which are left out of model context by default */
  includeAllTypes?: boolean;
}

export interface HistoryFilters {
  limit?: number;
  /** Only turns older than this id, for paging backwards */
  beforeTurnId?: number;
}

export interface RecordTokenUsageInput {
  user_id: string;
  thread_id: string;
  query_id: string;
  input_tokens: number;
  output_tokens: number;
}

/**
 * Ephemeral per-thread state snapshot kept by the session store.
 * Generic over the analysis and bundle shapes so the storage layer does not
 * depend on the agent package.
 */
export interface SessionCheckpoint<A = unknown, B = unknown> {
  threadId: string;
  lastAnalysis: A | null;
  lastBundle: B | null;
  step: string;
  /** Id of the newest persisted turn this checkpoint has seen, 0 when none */
  turnCursor: number;
  recentTurns: Turn[];
  updatedAt: string;
  /** True when the checkpoint was rebuilt from the persistent log */
  degraded: boolean;
}
