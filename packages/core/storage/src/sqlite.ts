import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StorageError, Result } from './errors.js';
import { Row, SqlParam, StorageAdapter, Transaction, isRow, toRows } from './adapter.js';

/**
 * Configuration for SQLite connection
 */
export interface SqliteConfig {
    /** Database file, or ':memory:' */
    filename: string;
}

type SqliteValue = string | number | bigint | null;

/**
 * Convert Postgres-style `$1` placeholders to SQLite `?`.
 * Parameters are reordered so `$2 ... $1` still binds correctly.
 */
function convertPlaceholders(sql: string, params: SqlParam[]): { sql: string; params: SqliteValue[] } {
    const ordered: SqliteValue[] = [];
    const converted = sql.replace(/\$(\d+)/g, (_match, index: string) => {
        ordered.push(toSqliteValue(params[Number(index) - 1] ?? null));
        return '?';
    });

    if (ordered.length === 0 && params.length > 0) {
        // Caller already used `?` placeholders
        return { sql, params: params.map(toSqliteValue) };
    }

    return { sql: converted, params: ordered };
}

function toSqliteValue(value: SqlParam): SqliteValue {
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    return value;
}

function toSqliteRecord(data: Record<string, SqlParam>): { columns: string[]; values: SqliteValue[] } {
    const columns = Object.keys(data);
    return { columns, values: columns.map(column => toSqliteValue(data[column] ?? null)) };
}

function classifyError(error: unknown, message: string): StorageError {
    const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : '';
    if (code.startsWith('SQLITE_CONSTRAINT')) {
        return { type: 'conflict', message: `${message}: constraint violated` };
    }
    if (code === 'SQLITE_CANTOPEN' || (error instanceof TypeError && /not open/i.test(error.message))) {
        return { type: 'unavailable', message, cause: error };
    }
    return { type: 'database', message, cause: error };
}

/**
 * SqliteAdapter provides database operations using SQLite
 */
export class SqliteAdapter implements StorageAdapter {
    readonly dialect = 'sqlite' as const;
    private db: Database.Database;
    /** Settles when the current holder of the connection is done */
    private lock: Promise<void> = Promise.resolve();

    constructor(config: SqliteConfig) {
        if (config.filename !== ':memory:') {
            // Ensure directory exists
            const dir = path.dirname(config.filename);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
        }

        this.db = new Database(config.filename);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
    }

    /**
     * Execute a SQL statement with parameter binding.
     * Statements that return data (SELECT, RETURNING) yield their rows.
     */
    async query(sql: string, params: SqlParam[] = []): Promise<Result<Row[], StorageError>> {
        return this.exclusive((): Result<Row[], StorageError> => {
            try {
                return { ok: true, value: this.run(sql, params) };
            } catch (error) {
                return { ok: false, error: classifyError(error, 'Query execution failed') };
            }
        });
    }

    /**
     * Execute one or more statements without parameters (schema changes)
     */
    async exec(sql: string): Promise<Result<void, StorageError>> {
        return this.exclusive((): Result<void, StorageError> => {
            try {
                this.db.exec(sql);
                return { ok: true, value: undefined };
            } catch (error) {
                return { ok: false, error: classifyError(error, 'Statement execution failed') };
            }
        });
    }

    /**
     * Insert a record into a table
     */
    async insert(table: string, data: Record<string, SqlParam>): Promise<Result<Row, StorageError>> {
        return this.exclusive((): Result<Row, StorageError> => {
            try {
                return { ok: true, value: this.insertRow(table, data) };
            } catch (error) {
                return { ok: false, error: classifyError(error, `Failed to insert into ${table}`) };
            }
        });
    }

    /**
     * Begin a transaction.
     * The connection is held until commit or rollback, so statements from
     * other callers cannot land inside another caller's transaction.
     */
    async beginTransaction(): Promise<Result<Transaction, StorageError>> {
        const release = await this.acquire();

        try {
            this.db.exec('BEGIN');
        } catch (error) {
            release();
            return { ok: false, error: classifyError(error, 'Failed to begin transaction') };
        }

        let finished = false;
        const finish = (sql: 'COMMIT' | 'ROLLBACK'): void => {
            if (finished) {
                return;
            }
            try {
                if (this.db.inTransaction) {
                    this.db.exec(sql);
                }
            } catch (error) {
                // A failed COMMIT (e.g. a deferred constraint) leaves the transaction open
                if (this.db.inTransaction) {
                    this.db.exec('ROLLBACK');
                }
                throw error;
            } finally {
                finished = true;
                release();
            }
        };

        const transaction: Transaction = {
            query: async (sql: string, params: SqlParam[] = []): Promise<Row[]> => this.run(sql, params),
            insert: async (table: string, data: Record<string, SqlParam>): Promise<Row> => this.insertRow(table, data),
            commit: async (): Promise<void> => finish('COMMIT'),
            rollback: async (): Promise<void> => finish('ROLLBACK'),
        };

        return { ok: true, value: transaction };
    }

    async close(): Promise<void> {
        if (this.db.open) {
            this.db.close();
        }
    }

    private async acquire(): Promise<() => void> {
        const previous = this.lock;
        let release: () => void = () => {};
        this.lock = new Promise<void>(resolve => {
            release = resolve;
        });
        await previous;
        return release;
    }

    private async exclusive<T>(work: () => T): Promise<T> {
        const release = await this.acquire();
        try {
            return work();
        } finally {
            release();
        }
    }

    private run(sql: string, params: SqlParam[]): Row[] {
        const converted = convertPlaceholders(sql, params);
        const stmt = this.db.prepare(converted.sql);

        if (stmt.reader) {
            return toRows(stmt.all(...converted.params));
        }

        stmt.run(...converted.params);
        return [];
    }

    private insertRow(table: string, data: Record<string, SqlParam>): Row {
        const { columns, values } = toSqliteRecord(data);
        const placeholders = columns.map(() => '?').join(', ');
        const sql = `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders}) RETURNING *`;
        const row = this.db.prepare(sql).get(...values);

        if (!isRow(row)) {
            throw new Error(`Insert into ${table} returned no row`);
        }
        return row;
    }
}
