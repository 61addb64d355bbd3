/**
 * ConversationStore - durable per-thread turn log and token usage ledger
 */

import { z } from 'zod';
import {
  consoleLogger,
  type Logger,
  type NewTurn,
  type ThreadStats,
  type TokenActivity,
  type Turn,
  type UserTokenStats,
} from '@campaign-agent/shared';
import { Row, SqlParam, StorageAdapter, Transaction } from './adapter.js';
import { Result, StorageError } from './errors.js';
import { HistoryFilters, ListRecentOptions, RecordTokenUsageInput, Thread } from './models.js';

export interface ConversationStoreConfig {
  adapter: StorageAdapter;
  logger?: Logger;
}

const DEFAULT_HISTORY_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

/**
 * JSON columns come back as text from SQLite and as parsed values from Postgres
 */
function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (typeof value === 'string' ? JSON.parse(value) : value), schema);
}

const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const attributionSchema = z.object({
  source_kind: z.enum(['structured', 'document', 'chart']),
  source_ref: z.string(),
  score: z.number().optional(),
});

const payloadSchema = z.object({
  table: z
    .object({
      columns: z.array(z.string()),
      rows: z.array(z.record(cellValueSchema)),
    })
    .optional(),
  chart: z
    .object({
      chart_type: z.enum(['bar', 'line']),
      title: z.string(),
      x: z.object({ field: z.string(), labels: z.array(z.string()) }),
      y: z.object({ field: z.string() }),
      series: z.array(z.object({ name: z.string(), values: z.array(z.number()) })),
    })
    .optional(),
});

const turnRowSchema = z.object({
  turn_id: z.coerce.number().int(),
  thread_id: z.string(),
  user_id: z.string().nullable(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  response_type: z.enum(['text', 'table', 'chart', 'error']),
  source_attributions: jsonColumn(z.array(attributionSchema)),
  payload: jsonColumn(payloadSchema.nullable()),
  input_tokens: z.coerce.number(),
  output_tokens: z.coerce.number(),
  total_tokens: z.coerce.number(),
  created_at: z.string(),
});

const threadRowSchema = z.object({
  thread_id: z.string(),
  user_id: z.string().nullable(),
  created_at: z.string(),
});

const countRowSchema = z.object({ count: z.coerce.number() });

const statsRowSchema = z.object({
  total_turns: z.coerce.number(),
  user_turns: z.coerce.number(),
  assistant_turns: z.coerce.number(),
  first_turn_at: z.string().nullable(),
  last_turn_at: z.string().nullable(),
});

const usageTotalsRowSchema = z.object({
  total_queries: z.coerce.number(),
  total_input_tokens: z.coerce.number(),
  total_output_tokens: z.coerce.number(),
  total_tokens: z.coerce.number(),
});

const activityRowSchema = z.object({
  thread_id: z.string(),
  input_tokens: z.coerce.number(),
  output_tokens: z.coerce.number(),
  total_tokens: z.coerce.number(),
  created_at: z.string(),
});

function toTurn(row: Row): Turn {
  const parsed = turnRowSchema.parse(row);
  return {
    turn_id: parsed.turn_id,
    thread_id: parsed.thread_id,
    user_id: parsed.user_id,
    role: parsed.role,
    content: parsed.content,
    response_type: parsed.response_type,
    source_attributions: parsed.source_attributions,
    token_usage: {
      input: parsed.input_tokens,
      output: parsed.output_tokens,
      total: parsed.total_tokens,
    },
    payload: parsed.payload,
    timestamp: parsed.created_at,
  };
}

/**
 * RETURNING order is not guaranteed; ids are assigned in insert order
 */
function toStoredTurns(rows: Row[], expected: number): Turn[] {
  if (rows.length !== expected) {
    throw new Error(`Turn insert returned ${rows.length} rows, expected ${expected}`);
  }
  return rows.map(toTurn).sort((a, b) => a.turn_id - b.turn_id);
}

function validationError(field: string, message: string): { ok: false; error: StorageError } {
  return { ok: false, error: { type: 'validation', field, message } };
}

function checkLimit(limit: number): string | null {
  if (!Number.isInteger(limit) || limit < 0) {
    return 'Limit must be a non-negative integer';
  }
  return null;
}

const TURN_COLUMNS = `thread_id, user_id, role, content, response_type, source_attributions, payload,
    input_tokens, output_tokens, total_tokens, created_at`;

const ENSURE_THREAD_SQL = `
  INSERT INTO threads (thread_id, user_id, created_at)
  VALUES ($1, $2, $3)
  ON CONFLICT (thread_id) DO NOTHING
`;

/**
 * One multi-row INSERT for all turns, numbering placeholders from `firstParam`
 */
function insertTurnsStatement(
  threadId: string,
  turns: NewTurn[],
  firstParam: number
): { sql: string; params: SqlParam[] } {
  const params: SqlParam[] = [];
  const tuples = turns.map(turn => {
    const start = firstParam + params.length;
    params.push(
      threadId,
      turn.user_id,
      turn.role,
      turn.content,
      turn.response_type,
      JSON.stringify(turn.source_attributions),
      turn.payload === null ? null : JSON.stringify(turn.payload),
      turn.token_usage.input,
      turn.token_usage.output,
      turn.token_usage.total,
      turn.timestamp
    );
    const placeholders = Array.from({ length: 11 }, (_, offset) => `$${start + offset}`);
    return `(${placeholders.join(', ')})`;
  });

  return {
    sql: `INSERT INTO turns (${TURN_COLUMNS}) VALUES ${tuples.join(', ')} RETURNING *`,
    params,
  };
}

// Postgres: a data-modifying CTE keeps the thread row and the turns in one statement
function postgresAppendStatement(
  threadId: string,
  userId: string | null,
  turns: NewTurn[]
): { sql: string; params: SqlParam[] } {
  const insert = insertTurnsStatement(threadId, turns, 4);
  return {
    sql: `WITH ensured_thread AS (${ENSURE_THREAD_SQL})\n${insert.sql}`,
    params: [threadId, userId, new Date().toISOString(), ...insert.params],
  };
}

const POSTGRES_CLEAR_SQL = `
  WITH deleted_turns AS (
    DELETE FROM turns WHERE thread_id = $1 RETURNING turn_id
  ), deleted_thread AS (
    DELETE FROM threads WHERE thread_id = $1
  )
  SELECT COUNT(*) AS count FROM deleted_turns
`;

/**
 * Persistent Memory Store.
 * Every mutation is atomic: one transaction on SQLite, one statement on Postgres.
 */
export class ConversationStore {
  private adapter: StorageAdapter;
  private logger: Logger;

  constructor(config: ConversationStoreConfig) {
    this.adapter = config.adapter;
    this.logger = config.logger ?? consoleLogger;
  }

  /**
   * Create the thread row if it does not exist yet
   */
  async ensureThread(threadId: string, userId: string | null): Promise<Result<Thread, StorageError>> {
    if (!threadId.trim()) {
      return validationError('thread_id', 'Thread id is required');
    }

    const inserted = await this.adapter.query(ENSURE_THREAD_SQL, [threadId, userId, new Date().toISOString()]);
    if (!inserted.ok) {
      return inserted;
    }

    const found = await this.adapter.query('SELECT * FROM threads WHERE thread_id = $1', [threadId]);
    if (!found.ok) {
      return found;
    }

    const row = found.value[0];
    if (!row) {
      return { ok: false, error: { type: 'not_found', resource: 'thread', id: threadId } };
    }
    return this.mapRow(() => threadRowSchema.parse(row), 'thread');
  }

  /**
   * Append one turn and return its store-assigned id
   */
  async append(threadId: string, turn: NewTurn): Promise<Result<number, StorageError>> {
    const result = await this.appendTurns(threadId, [turn]);
    if (!result.ok) {
      return result;
    }

    const [stored] = result.value;
    if (!stored) {
      return { ok: false, error: { type: 'database', message: 'Append returned no turn' } };
    }
    return { ok: true, value: stored.turn_id };
  }

  /**
   * Append a user turn and its response in one transaction
   */
  async appendExchange(threadId: string, exchange: [NewTurn, NewTurn]): Promise<Result<[Turn, Turn], StorageError>> {
    const result = await this.appendTurns(threadId, exchange);
    if (!result.ok) {
      return result;
    }

    const [userTurn, assistantTurn] = result.value;
    if (!userTurn || !assistantTurn) {
      return { ok: false, error: { type: 'database', message: 'Exchange append returned too few turns' } };
    }
    return { ok: true, value: [userTurn, assistantTurn] };
  }

  /**
   * The newest `limit` turns of a thread, newest-last.
   * Only text turns are returned unless `includeAllTypes` is set.
   */
  async listRecent(
    threadId: string,
    limit: number,
    options: ListRecentOptions = {}
  ): Promise<Result<Turn[], StorageError>> {
    const limitError = checkLimit(limit);
    if (limitError) {
      return validationError('limit', limitError);
    }
    if (limit === 0) {
      return { ok: true, value: [] };
    }

    const typeFilter = options.includeAllTypes ? '' : "AND response_type = 'text'";
    const result = await this.adapter.query(
      `SELECT * FROM (
         SELECT * FROM turns
         WHERE thread_id = $1 ${typeFilter}
         ORDER BY turn_id DESC
         LIMIT $2
       ) recent
       ORDER BY turn_id ASC`,
      [threadId, Math.min(limit, MAX_LIST_LIMIT)]
    );
    if (!result.ok) {
      return result;
    }

    return this.mapRow(() => result.value.map(toTurn), 'turns');
  }

  /**
   * Full history with every response type and payload, newest-last.
   * Pass `beforeTurnId` to page backwards.
   */
  async listHistory(threadId: string, filters: HistoryFilters = {}): Promise<Result<Turn[], StorageError>> {
    const limit = filters.limit ?? DEFAULT_HISTORY_LIMIT;
    const limitError = checkLimit(limit);
    if (limitError) {
      return validationError('limit', limitError);
    }

    const params: SqlParam[] = [threadId, Math.min(limit, MAX_LIST_LIMIT)];
    let cursor = '';
    if (filters.beforeTurnId !== undefined) {
      params.push(filters.beforeTurnId);
      cursor = 'AND turn_id < $3';
    }

    const result = await this.adapter.query(
      `SELECT * FROM (
         SELECT * FROM turns
         WHERE thread_id = $1 ${cursor}
         ORDER BY turn_id DESC
         LIMIT $2
       ) page
       ORDER BY turn_id ASC`,
      params
    );
    if (!result.ok) {
      return result;
    }

    return this.mapRow(() => result.value.map(toTurn), 'turns');
  }

  /**
   * Delete every turn of a thread and the thread itself. Irreversible.
   * Returns the number of deleted turns.
   */
  async clear(threadId: string): Promise<Result<number, StorageError>> {
    const cleared =
      this.adapter.dialect === 'postgres'
        ? await this.clearInOneStatement(threadId)
        : await this.withTransaction(async tx => {
            const [row] = await tx.query('SELECT COUNT(*) AS count FROM turns WHERE thread_id = $1', [threadId]);
            const { count } = countRowSchema.parse(row ?? { count: 0 });

            await tx.query('DELETE FROM turns WHERE thread_id = $1', [threadId]);
            await tx.query('DELETE FROM threads WHERE thread_id = $1', [threadId]);
            return count;
          });

    if (cleared.ok) {
      this.logger.info('Cleared conversation thread', { threadId, deletedTurns: cleared.value });
    }
    return cleared;
  }

  async getThreadStats(threadId: string): Promise<Result<ThreadStats, StorageError>> {
    const result = await this.adapter.query(
      `SELECT
         COUNT(*) AS total_turns,
         COALESCE(SUM(CASE WHEN role = 'user' THEN 1 ELSE 0 END), 0) AS user_turns,
         COALESCE(SUM(CASE WHEN role = 'assistant' THEN 1 ELSE 0 END), 0) AS assistant_turns,
         MIN(created_at) AS first_turn_at,
         MAX(created_at) AS last_turn_at
       FROM turns
       WHERE thread_id = $1`,
      [threadId]
    );
    if (!result.ok) {
      return result;
    }

    return this.mapRow(() => {
      const stats = statsRowSchema.parse(result.value[0]);
      return { thread_id: threadId, ...stats };
    }, 'thread stats');
  }

  /**
   * Record token usage for one query. A second call with the same
   * `query_id` is a no-op and reports `recorded: false`.
   */
  async recordTokenUsage(input: RecordTokenUsageInput): Promise<Result<{ recorded: boolean }, StorageError>> {
    if (!input.query_id.trim()) {
      return validationError('query_id', 'Query id is required');
    }
    if (input.input_tokens < 0 || input.output_tokens < 0) {
      return validationError('tokens', 'Token counts must be non-negative');
    }

    const result = await this.adapter.insert('token_usage', {
      user_id: input.user_id,
      thread_id: input.thread_id,
      query_id: input.query_id,
      input_tokens: input.input_tokens,
      output_tokens: input.output_tokens,
      total_tokens: input.input_tokens + input.output_tokens,
      created_at: new Date().toISOString(),
    });

    if (!result.ok) {
      if (result.error.type === 'conflict') {
        this.logger.debug('Token usage already recorded', { queryId: input.query_id });
        return { ok: true, value: { recorded: false } };
      }
      return result;
    }
    return { ok: true, value: { recorded: true } };
  }

  async getUserTokenStats(userId: string): Promise<Result<UserTokenStats, StorageError>> {
    const result = await this.adapter.query(
      `SELECT
         COUNT(*) AS total_queries,
         COALESCE(SUM(input_tokens), 0) AS total_input_tokens,
         COALESCE(SUM(output_tokens), 0) AS total_output_tokens,
         COALESCE(SUM(total_tokens), 0) AS total_tokens
       FROM token_usage
       WHERE user_id = $1`,
      [userId]
    );
    if (!result.ok) {
      return result;
    }

    return this.mapRow(() => {
      const totals = usageTotalsRowSchema.parse(result.value[0]);
      const average = totals.total_queries > 0 ? totals.total_tokens / totals.total_queries : 0;
      return {
        user_id: userId,
        ...totals,
        avg_tokens_per_query: Math.round(average * 100) / 100,
      };
    }, 'token stats');
  }

  /**
   * Most recent token usage entries for a user, newest first
   */
  async getRecentActivity(userId: string, limit: number = 10): Promise<Result<TokenActivity[], StorageError>> {
    const limitError = checkLimit(limit);
    if (limitError) {
      return validationError('limit', limitError);
    }

    const result = await this.adapter.query(
      `SELECT thread_id, input_tokens, output_tokens, total_tokens, created_at
       FROM token_usage
       WHERE user_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [userId, Math.min(limit, MAX_LIST_LIMIT)]
    );
    if (!result.ok) {
      return result;
    }

    return this.mapRow(
      () =>
        result.value.map(row => {
          const parsed = activityRowSchema.parse(row);
          return {
            thread_id: parsed.thread_id,
            input_tokens: parsed.input_tokens,
            output_tokens: parsed.output_tokens,
            total_tokens: parsed.total_tokens,
            timestamp: parsed.created_at,
          };
        }),
      'token activity'
    );
  }

  private async appendTurns(threadId: string, turns: NewTurn[]): Promise<Result<Turn[], StorageError>> {
    if (!threadId.trim()) {
      return validationError('thread_id', 'Thread id is required');
    }
    for (const turn of turns) {
      if (turn.thread_id !== threadId) {
        return validationError('thread_id', `Turn belongs to thread ${turn.thread_id}, not ${threadId}`);
      }
    }

    const userId = turns.find(turn => turn.user_id !== null)?.user_id ?? null;

    if (this.adapter.dialect === 'postgres') {
      const statement = postgresAppendStatement(threadId, userId, turns);
      const inserted = await this.adapter.query(statement.sql, statement.params);
      if (!inserted.ok) {
        return inserted;
      }
      return this.mapRow(() => toStoredTurns(inserted.value, turns.length), 'turns');
    }

    return this.withTransaction(async tx => {
      await tx.query(ENSURE_THREAD_SQL, [threadId, userId, new Date().toISOString()]);
      const statement = insertTurnsStatement(threadId, turns, 1);
      return toStoredTurns(await tx.query(statement.sql, statement.params), turns.length);
    });
  }

  private async clearInOneStatement(threadId: string): Promise<Result<number, StorageError>> {
    const result = await this.adapter.query(POSTGRES_CLEAR_SQL, [threadId]);
    if (!result.ok) {
      return result;
    }
    return this.mapRow(() => countRowSchema.parse(result.value[0] ?? { count: 0 }).count, 'count');
  }

  private async withTransaction<T>(work: (tx: Transaction) => Promise<T>): Promise<Result<T, StorageError>> {
    const adapter = this.adapter;
    if (!adapter.beginTransaction) {
      return {
        ok: false,
        error: { type: 'database', message: `The ${adapter.dialect} adapter cannot hold a transaction` },
      };
    }

    const begun = await adapter.beginTransaction();
    if (!begun.ok) {
      return begun;
    }

    const tx = begun.value;
    try {
      const value = await work(tx);
      await tx.commit();
      return { ok: true, value };
    } catch (error) {
      try {
        await tx.rollback();
      } catch (rollbackError) {
        this.logger.error('Transaction rollback failed', { error: String(rollbackError) });
      }
      return {
        ok: false,
        error: { type: 'database', message: 'Transaction failed', cause: error },
      };
    }
  }

  private mapRow<T>(map: () => T, resource: string): Result<T, StorageError> {
    try {
      return { ok: true, value: map() };
    } catch (error) {
      this.logger.error(`Malformed ${resource} row`, { error: String(error) });
      return {
        ok: false,
        error: { type: 'database', message: `Malformed ${resource} row`, cause: error },
      };
    }
  }
}
