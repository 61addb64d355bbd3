/**
 * Orchestrator - drives one query through the workflow and owns both memory layers.
 *
 * Start -> Analyzing -> Routing -> (Retrieving) -> Generating -> Persisting -> Done,
 * with Errored reachable when there is no checkpoint and the persistent log
 * cannot be read.
 */

import { randomUUID } from 'crypto';
import { consoleLogger, type Logger, type NewTurn, type TokenUsage, type Turn } from '@campaign-agent/shared';
import {
  describeStorageError,
  rebuildCheckpoint,
  type ListRecentOptions,
  type RecordTokenUsageInput,
  type Result,
  type SessionCheckpoint,
  type StorageError,
} from '@campaign-agent/storage';
import type { QueryAnalyzer } from './analyzer.js';
import { QueryCancelledError, QueryFailedError } from './errors.js';
import type { ResponseGenerator } from './generator.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { DataRetriever } from './retriever.js';
import { route } from './router.js';
import { TokenRecorder } from './token-recorder.js';
import type { ContextTurn, NextStage, QueryAnalysis, RetrievedDataBundle, WorkflowState } from './types.js';

export const ANONYMOUS_USER = 'anonymous';

/**
 * Durable turn log, as the orchestrator uses it
 */
export interface PersistentMemory {
  listRecent(threadId: string, limit: number, options?: ListRecentOptions): Promise<Result<Turn[], StorageError>>;
  appendExchange(threadId: string, exchange: [NewTurn, NewTurn]): Promise<Result<[Turn, Turn], StorageError>>;
  recordTokenUsage(input: RecordTokenUsageInput): Promise<Result<{ recorded: boolean }, StorageError>>;
  clear(threadId: string): Promise<Result<number, StorageError>>;
}

export type WorkflowCheckpoint = SessionCheckpoint<QueryAnalysis, RetrievedDataBundle>;

/**
 * Ephemeral per-thread checkpoints. `get` may return nothing at any time.
 */
export interface SessionMemory {
  get(threadId: string): WorkflowCheckpoint | undefined;
  put(threadId: string, checkpoint: WorkflowCheckpoint): void;
  delete(threadId: string): boolean;
}

export interface OrchestratorConfig {
  analyzer: Pick<QueryAnalyzer, 'analyze'>;
  retriever: Pick<DataRetriever, 'retrieve'>;
  generator: Pick<ResponseGenerator, 'generate'>;
  persistent: PersistentMemory;
  session: SessionMemory;
  /** Recent turns fed to the analyzer and generator (default 10) */
  contextLimit?: number;
  /** Failed commits kept per thread for retry (default 20) */
  maxPendingPerThread?: number;
  logger?: Logger;
}

export interface ProcessQueryInput {
  threadId: string;
  userId?: string | null;
  text: string;
  signal?: AbortSignal;
}

/**
 * A turn as returned to the caller. `turn_id` is null while its write is
 * still waiting for a retry.
 */
export type ReturnedTurn = Omit<Turn, 'turn_id'> & { turn_id: number | null };

export interface QueryOutcome {
  turn: ReturnedTurn;
  userTurn: ReturnedTurn;
  analysis: QueryAnalysis;
  route: NextStage;
  /** Both turns and the token usage reached the persistent store */
  persisted: boolean;
  /** Some part of the commit is queued for a best-effort retry */
  pendingRetry: boolean;
  tokenUsage: TokenUsage;
  trace: WorkflowState[];
}

export interface FlushResult {
  flushed: number;
  remaining: number;
}

interface PendingCommit {
  queryId: string;
  userId: string;
  /** Null once the turns are stored and only the usage record is left */
  exchange: [NewTurn, NewTurn] | null;
  usage: TokenUsage;
}

const NO_TOKENS: TokenUsage = { input: 0, output: 0, total: 0 };

function toContext(turns: Array<Pick<Turn, 'role' | 'content' | 'response_type'>>): ContextTurn[] {
  return turns.map(turn => ({ role: turn.role, content: turn.content, response_type: turn.response_type }));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Orchestrator {
  private analyzer: Pick<QueryAnalyzer, 'analyze'>;
  private retriever: Pick<DataRetriever, 'retrieve'>;
  private generator: Pick<ResponseGenerator, 'generate'>;
  private persistent: PersistentMemory;
  private session: SessionMemory;
  private contextLimit: number;
  private maxPending: number;
  private logger: Logger;
  private mutex = new KeyedMutex();
  private pending = new Map<string, PendingCommit[]>();

  constructor(config: OrchestratorConfig) {
    this.analyzer = config.analyzer;
    this.retriever = config.retriever;
    this.generator = config.generator;
    this.persistent = config.persistent;
    this.session = config.session;
    this.contextLimit = config.contextLimit ?? 10;
    this.maxPending = config.maxPendingPerThread ?? 20;
    this.logger = config.logger ?? consoleLogger;
  }

  /**
   * Process one query. Queries on the same thread run one at a time.
   *
   * Rejects with QueryFailedError only when the thread's history cannot be
   * read, and with QueryCancelledError when cancelled before persisting.
   */
  async processQuery(input: ProcessQueryInput): Promise<QueryOutcome> {
    const text = input.text.trim();
    if (!text) {
      throw new QueryFailedError({ type: 'validation', field: 'text', message: 'Query text is required' });
    }
    if (!input.threadId.trim()) {
      throw new QueryFailedError({ type: 'validation', field: 'thread_id', message: 'Thread id is required' });
    }
    if (input.signal?.aborted) {
      throw new QueryCancelledError('Start');
    }

    return this.mutex.runExclusive(input.threadId, () => this.run(input.threadId, input.userId ?? null, text, input.signal));
  }

  /**
   * Retry queued commits for one thread, or for every thread with a backlog
   */
  async flushPending(threadId?: string): Promise<FlushResult> {
    const threadIds = threadId === undefined ? [...this.pending.keys()] : [threadId];
    let flushed = 0;
    let remaining = 0;

    for (const id of threadIds) {
      const result = await this.mutex.runExclusive(id, () => this.flushThread(id));
      flushed += result.flushed;
      remaining += result.remaining;
    }

    return { flushed, remaining };
  }

  /**
   * Drop a thread's checkpoint, queued retries and persisted log.
   * Returns the number of deleted turns.
   */
  async clearThread(threadId: string): Promise<number> {
    return this.mutex.runExclusive(threadId, async () => {
      this.pending.delete(threadId);
      this.session.delete(threadId);

      const cleared = await this.persistent.clear(threadId);
      if (!cleared.ok) {
        const message = describeStorageError(cleared.error);
        this.logger.error('Failed to clear thread', { threadId, error: message });
        throw new QueryFailedError({ type: 'persistence_error', message, cause: cleared.error });
      }

      this.logger.info('Thread cleared', { threadId, turns: cleared.value });
      return cleared.value;
    });
  }

  pendingCount(threadId?: string): number {
    if (threadId !== undefined) {
      return this.pending.get(threadId)?.length ?? 0;
    }
    let count = 0;
    for (const queue of this.pending.values()) {
      count += queue.length;
    }
    return count;
  }

  private async run(threadId: string, userId: string | null, text: string, signal?: AbortSignal): Promise<QueryOutcome> {
    const startedAt = Date.now();
    const trace: WorkflowState[] = [];
    const recorder = new TokenRecorder();

    const enter = (state: WorkflowState): void => {
      trace.push(state);
      this.logger.debug('Workflow state', { threadId, state });
    };
    const checkCancelled = (stage: WorkflowState): void => {
      if (signal?.aborted) {
        this.logger.info('Query cancelled', { threadId, stage });
        throw new QueryCancelledError(stage);
      }
    };

    // Start: earlier failed commits go first so turn order is kept
    enter('Start');
    if (this.pendingCount(threadId) > 0) {
      await this.flushThread(threadId);
    }

    const base = this.session.get(threadId) ?? (await this.restoreCheckpoint(threadId, enter));
    this.logger.debug('Session checkpoint loaded', {
      threadId,
      turnCursor: base.turnCursor,
      degraded: base.degraded,
    });

    const queuedTurns = (this.pending.get(threadId) ?? [])
      .flatMap(entry => entry.exchange ?? [])
      .filter(turn => turn.response_type === 'text');
    const context = toContext([...base.recentTurns, ...queuedTurns].slice(-this.contextLimit));
    checkCancelled('Start');

    enter('Analyzing');
    const analysis = await this.analyzer.analyze({
      text,
      recentTurns: context,
      previous: base.lastAnalysis,
      recorder,
      signal,
    });
    checkCancelled('Analyzing');

    enter('Routing');
    const next = route(analysis);

    let bundle: RetrievedDataBundle | null = null;
    if (next === 'DataRetriever') {
      enter('Retrieving');
      bundle = await this.retriever.retrieve(analysis, text, signal);
      for (const source of bundle.degraded) {
        this.logger.warn('Degraded data source', { threadId, ...source });
      }
      checkCancelled('Retrieving');
    }

    enter('Generating');
    const reply = await this.generator.generate({ text, analysis, bundle, recentTurns: context, recorder, signal });
    checkCancelled('Generating');

    // Persisting: past this point the query completes even if cancelled
    enter('Persisting');
    const usage = recorder.snapshot();
    const userTurn: NewTurn = {
      thread_id: threadId,
      user_id: userId,
      role: 'user',
      content: text,
      response_type: 'text',
      source_attributions: [],
      token_usage: { ...NO_TOKENS },
      payload: null,
      timestamp: new Date(startedAt).toISOString(),
    };
    const assistantTurn: NewTurn = {
      thread_id: threadId,
      user_id: userId,
      role: 'assistant',
      content: reply.content,
      response_type: reply.response_type,
      source_attributions: reply.source_attributions,
      token_usage: usage,
      payload: reply.payload,
      timestamp: new Date().toISOString(),
    };

    const { stored, pendingRetry } = await this.commit(threadId, {
      queryId: randomUUID(),
      userId: userId ?? ANONYMOUS_USER,
      exchange: [userTurn, assistantTurn],
      usage,
    });

    const storedText = stored ? stored.filter(turn => turn.response_type === 'text') : [];
    this.saveCheckpoint({
      threadId,
      lastAnalysis: analysis,
      lastBundle: bundle,
      step: 'Done',
      turnCursor: stored ? stored[1].turn_id : base.turnCursor,
      recentTurns: [...base.recentTurns, ...storedText].slice(-this.contextLimit),
      updatedAt: new Date().toISOString(),
      degraded: false,
    });

    enter('Done');
    this.logger.info('Query processed', {
      threadId,
      intent: analysis.intent,
      route: next,
      responseType: reply.response_type,
      tokens: usage.total,
      persisted: stored !== null && !pendingRetry,
      durationMs: Date.now() - startedAt,
    });

    return {
      turn: stored ? stored[1] : { ...assistantTurn, turn_id: null },
      userTurn: stored ? stored[0] : { ...userTurn, turn_id: null },
      analysis,
      route: next,
      persisted: stored !== null && !pendingRetry,
      pendingRetry,
      tokenUsage: usage,
      trace,
    };
  }

  /**
   * Rebuild a missing checkpoint from the persisted log. The log being
   * unreadable is the one failure that ends a query without a reply.
   */
  private async restoreCheckpoint(
    threadId: string,
    enter: (state: WorkflowState) => void
  ): Promise<WorkflowCheckpoint> {
    const recent = await this.persistent.listRecent(threadId, this.contextLimit);
    if (!recent.ok) {
      enter('Errored');
      const message = describeStorageError(recent.error);
      this.logger.error('Conversation history unavailable', { threadId, error: message });
      throw new QueryFailedError({
        type: 'persistence_error',
        message: `Conversation history unavailable: ${message}`,
        cause: recent.error,
      });
    }

    this.logger.debug('No session checkpoint, rebuilding from persisted turns', { threadId });
    return rebuildCheckpoint(threadId, recent.value);
  }

  /**
   * Write the exchange and its token usage. Anything that fails is queued;
   * the caller gets its response either way.
   */
  private async commit(
    threadId: string,
    entry: PendingCommit
  ): Promise<{ stored: [Turn, Turn] | null; pendingRetry: boolean }> {
    if (this.pendingCount(threadId) > 0) {
      // An older commit is still queued; keep this one behind it
      this.enqueue(threadId, entry);
      return { stored: null, pendingRetry: true };
    }

    const stored = await this.writeEntry(threadId, entry);
    if (stored.remaining) {
      this.enqueue(threadId, stored.remaining);
      return { stored: stored.turns, pendingRetry: true };
    }
    return { stored: stored.turns, pendingRetry: false };
  }

  /**
   * Returns the stored turns, if any, and whatever part of the entry still
   * needs writing
   */
  private async writeEntry(
    threadId: string,
    entry: PendingCommit
  ): Promise<{ turns: [Turn, Turn] | null; remaining: PendingCommit | null }> {
    let turns: [Turn, Turn] | null = null;

    if (entry.exchange) {
      const appended = await this.persistent.appendExchange(threadId, entry.exchange);
      if (!appended.ok) {
        this.logger.error('Failed to persist turns, queued for retry', {
          threadId,
          queryId: entry.queryId,
          error: describeStorageError(appended.error),
        });
        return { turns: null, remaining: entry };
      }
      turns = appended.value;
    }

    const recorded = await this.persistent.recordTokenUsage({
      user_id: entry.userId,
      thread_id: threadId,
      query_id: entry.queryId,
      input_tokens: entry.usage.input,
      output_tokens: entry.usage.output,
    });
    if (!recorded.ok) {
      this.logger.error('Failed to record token usage, queued for retry', {
        threadId,
        queryId: entry.queryId,
        error: describeStorageError(recorded.error),
      });
      return { turns, remaining: { ...entry, exchange: null } };
    }

    return { turns, remaining: null };
  }

  private enqueue(threadId: string, entry: PendingCommit): void {
    const queue = this.pending.get(threadId) ?? [];
    queue.push(entry);
    while (queue.length > this.maxPending) {
      const dropped = queue.shift();
      this.logger.error('Pending commit queue full, dropping oldest entry', { threadId, queryId: dropped?.queryId });
    }
    this.pending.set(threadId, queue);
  }

  /**
   * Write queued commits in order, stopping at the first failure.
   * Must run under the thread's lock.
   */
  private async flushThread(threadId: string): Promise<FlushResult> {
    const queue = this.pending.get(threadId);
    if (!queue) {
      return { flushed: 0, remaining: 0 };
    }

    let flushed = 0;
    const stored: Turn[] = [];

    while (queue.length > 0) {
      const [head] = queue;
      if (!head) {
        break;
      }

      const result = await this.writeEntry(threadId, head);
      if (result.turns) {
        stored.push(...result.turns);
      }
      if (result.remaining) {
        queue[0] = result.remaining;
        break;
      }
      queue.shift();
      flushed++;
    }

    if (queue.length === 0) {
      this.pending.delete(threadId);
    }

    const lastStored = stored[stored.length - 1];
    const checkpoint = lastStored ? this.session.get(threadId) : undefined;
    if (checkpoint && lastStored) {
      // Flushed turns were only in the queue until now
      const storedText = stored.filter(turn => turn.response_type === 'text');
      this.saveCheckpoint({
        ...checkpoint,
        turnCursor: Math.max(checkpoint.turnCursor, lastStored.turn_id),
        recentTurns: [...checkpoint.recentTurns, ...storedText].slice(-this.contextLimit),
      });
    }

    if (flushed > 0) {
      this.logger.info('Flushed pending commits', { threadId, flushed, remaining: queue.length });
    }
    return { flushed, remaining: queue.length };
  }

  private saveCheckpoint(checkpoint: WorkflowCheckpoint): void {
    try {
      this.session.put(checkpoint.threadId, checkpoint);
    } catch (error) {
      this.logger.error('Failed to save session checkpoint', { threadId: checkpoint.threadId, error: errorMessage(error) });
    }
  }
}
