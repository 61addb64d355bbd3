/**
 * PostgresAdapter - Abstraction over Supabase Postgres client
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StorageError, Result } from './errors.js';
import { Row, SqlParam, StorageAdapter, isRow, toRows } from './adapter.js';

/**
 * Configuration for Postgres connection
 */
export interface PostgresConfig {
  url: string;
  apiKey: string;
}

interface PostgrestErrorLike {
  code?: string;
  message: string;
}

function classifyError(error: PostgrestErrorLike, message: string): StorageError {
  // Unique constraint violation
  if (error.code === '23505') {
    return { type: 'conflict', message: `${message}: record already exists` };
  }
  return { type: 'database', message, cause: error };
}

/**
 * PostgresAdapter runs SQL through the `exec_sql` RPC function and
 * inserts through PostgREST.
 *
 * Every request is its own database transaction, so there is no
 * `beginTransaction`: work that must be atomic goes in one statement.
 */
export class PostgresAdapter implements StorageAdapter {
  readonly dialect = 'postgres' as const;
  private client: SupabaseClient;

  constructor(config: PostgresConfig) {
    this.client = createClient(config.url, config.apiKey, {
      db: {
        schema: 'public',
      },
      auth: {
        persistSession: false,
      },
    });
  }

  /**
   * Execute a raw SQL query with parameter binding
   */
  async query(sql: string, params: SqlParam[] = []): Promise<Result<Row[], StorageError>> {
    try {
      const { data, error } = await this.client.rpc('exec_sql', {
        query: sql,
        params: params.map(param => (typeof param === 'bigint' ? param.toString() : param)),
      });

      if (error) {
        return { ok: false, error: classifyError(error, 'Query execution failed') };
      }

      return { ok: true, value: toRows(data) };
    } catch (error) {
      return {
        ok: false,
        error: { type: 'unavailable', message: 'Query execution failed', cause: error },
      };
    }
  }

  async exec(sql: string): Promise<Result<void, StorageError>> {
    const result = await this.query(sql);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: undefined };
  }

  /**
   * Insert a record into a table with RETURNING clause
   */
  async insert(table: string, data: Record<string, SqlParam>): Promise<Result<Row, StorageError>> {
    try {
      const { data: result, error } = await this.client
        .from(table)
        .insert(data)
        .select()
        .single();

      if (error) {
        return { ok: false, error: classifyError(error, `Failed to insert into ${table}`) };
      }

      if (!isRow(result)) {
        return {
          ok: false,
          error: { type: 'database', message: `Insert into ${table} returned no row` },
        };
      }

      return { ok: true, value: result };
    } catch (error) {
      return {
        ok: false,
        error: { type: 'unavailable', message: `Failed to insert into ${table}`, cause: error },
      };
    }
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }
}
