import { Result, StorageError } from './errors.js';

/**
 * A database row as returned by an adapter, before the caller maps it
 */
export type Row = Record<string, unknown>;

export type SqlParam = string | number | bigint | boolean | null;

export type SqlDialect = 'sqlite' | 'postgres';

/**
 * Transaction interface for atomic operations
 */
export interface Transaction {
    query(sql: string, params?: SqlParam[]): Promise<Row[]>;
    insert(table: string, data: Record<string, SqlParam>): Promise<Row>;
    commit(): Promise<void>;
    rollback(): Promise<void>;
}

/**
 * Common interface for storage adapters (Postgres, SQLite).
 * SQL passed to `query` uses `$1, $2` placeholders for both dialects.
 */
export interface StorageAdapter {
    readonly dialect: SqlDialect;
    query(sql: string, params?: SqlParam[]): Promise<Result<Row[], StorageError>>;
    exec(sql: string): Promise<Result<void, StorageError>>;
    insert(table: string, data: Record<string, SqlParam>): Promise<Result<Row, StorageError>>;
    /**
     * Only for connections that can hold a transaction across calls.
     * Without it, each statement commits on its own.
     */
    beginTransaction?(): Promise<Result<Transaction, StorageError>>;
    close(): Promise<void>;
}

export function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toRows(values: unknown): Row[] {
    return Array.isArray(values) ? values.filter(isRow) : [];
}
