/**
 * MigrationRunner - Manages database schema migrations
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { consoleLogger, type Logger } from '@campaign-agent/shared';
import type { StorageAdapter } from '../adapter.js';
import { describeStorageError } from '../errors.js';

/**
 * Configuration for migration runner
 */
export interface MigrationConfig {
  adapter: StorageAdapter;
  /** Directory of numbered .sql files; defaults to the bundled set for the adapter's dialect */
  migrationsPath?: string;
  logger?: Logger;
}

/**
 * Represents a migration file
 */
export interface Migration {
  id: number;
  name: string;
  filename: string;
  up: string;
  down: string | null;
}

export interface MigrationStatus {
  id: number;
  name: string;
  applied: boolean;
}

const appliedRowSchema = z.object({
  id: z.coerce.number(),
  name: z.string(),
});

const DOWN_MARKER = /^--\s*DOWN MIGRATION\s*$/im;

const MIGRATIONS_TABLE_SQL = {
  sqlite: `
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
  `,
  postgres: `
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `,
} as const;

/**
 * Split a migration file into its up and down sections
 */
export function parseMigration(sql: string): { up: string; down: string | null } {
  const marker = DOWN_MARKER.exec(sql);
  if (!marker) {
    return { up: sql.trim(), down: null };
  }

  const up = sql.slice(0, marker.index).trim();
  const down = sql.slice(marker.index + marker[0].length).trim();
  return { up, down: down.length > 0 ? down : null };
}

/**
 * MigrationRunner applies numbered SQL files through a StorageAdapter and
 * tracks them in `schema_migrations`
 */
export class MigrationRunner {
  private adapter: StorageAdapter;
  private migrationsPath: string;
  private logger: Logger;

  constructor(config: MigrationConfig) {
    this.adapter = config.adapter;
    this.logger = config.logger ?? consoleLogger;
    this.migrationsPath =
      config.migrationsPath ??
      fileURLToPath(new URL(`../../migrations/${config.adapter.dialect}/`, import.meta.url));
  }

  /**
   * Apply all pending migrations in id order and return the ones applied
   */
  async up(): Promise<Migration[]> {
    await this.initMigrationsTable();

    const appliedIds = new Set((await this.getAppliedMigrations()).map(m => m.id));
    const pending = (await this.readMigrationFiles()).filter(m => !appliedIds.has(m.id));

    for (const migration of pending) {
      await this.executeMigration(migration);
    }

    if (pending.length > 0) {
      this.logger.info(`Applied ${pending.length} migration(s)`, {
        ids: pending.map(m => m.id),
      });
    }
    return pending;
  }

  /**
   * Roll back the last `count` applied migrations, newest first
   */
  async down(count: number = 1): Promise<Migration[]> {
    await this.initMigrationsTable();

    const applied = await this.getAppliedMigrations();
    const migrationMap = new Map((await this.readMigrationFiles()).map(m => [m.id, m]));
    const rolledBack: Migration[] = [];

    for (const record of applied.slice(-count).reverse()) {
      const migration = migrationMap.get(record.id);
      if (!migration) {
        throw new Error(
          `Migration file for ${record.id} (${record.name}) not found. ` +
          `Cannot rollback without the migration file.`
        );
      }
      await this.rollbackMigration(migration);
      rolledBack.push(migration);
    }

    return rolledBack;
  }

  async status(): Promise<MigrationStatus[]> {
    await this.initMigrationsTable();

    const appliedIds = new Set((await this.getAppliedMigrations()).map(m => m.id));
    const migrations = await this.readMigrationFiles();
    return migrations.map(m => ({ id: m.id, name: m.name, applied: appliedIds.has(m.id) }));
  }

  private async initMigrationsTable(): Promise<void> {
    const result = await this.adapter.exec(MIGRATIONS_TABLE_SQL[this.adapter.dialect]);
    if (!result.ok) {
      throw new Error(`Failed to create migrations table: ${describeStorageError(result.error)}`);
    }
  }

  private async getAppliedMigrations(): Promise<{ id: number; name: string }[]> {
    const result = await this.adapter.query('SELECT id, name FROM schema_migrations ORDER BY id ASC');
    if (!result.ok) {
      throw new Error(`Failed to query applied migrations: ${describeStorageError(result.error)}`);
    }
    return result.value.map(row => appliedRowSchema.parse(row));
  }

  private async readMigrationFiles(): Promise<Migration[]> {
    const files = (await readdir(this.migrationsPath)).filter(file => file.endsWith('.sql')).sort();
    const migrations: Migration[] = [];

    for (const filename of files) {
      // "001_conversation_schema.sql" -> 1, "conversation schema"
      const match = filename.match(/^(\d+)_(.+)\.sql$/);
      if (!match) {
        this.logger.warn(`Skipping invalid migration filename: ${filename}`);
        continue;
      }

      const sql = await readFile(join(this.migrationsPath, filename), 'utf-8');
      const { up, down } = parseMigration(sql);
      migrations.push({
        id: Number.parseInt(match[1] ?? '0', 10),
        name: (match[2] ?? filename).replace(/_/g, ' '),
        filename,
        up,
        down,
      });
    }

    return migrations;
  }

  private async executeMigration(migration: Migration): Promise<void> {
    this.logger.debug(`Applying migration ${migration.id}: ${migration.name}`);

    const exec = await this.adapter.exec(migration.up);
    if (!exec.ok) {
      throw new Error(`Failed to execute migration ${migration.id}: ${describeStorageError(exec.error)}`);
    }

    const record = await this.adapter.insert('schema_migrations', {
      id: migration.id,
      name: migration.name,
    });
    if (!record.ok) {
      throw new Error(`Failed to record migration ${migration.id}: ${describeStorageError(record.error)}`);
    }
  }

  private async rollbackMigration(migration: Migration): Promise<void> {
    if (!migration.down) {
      throw new Error(
        `Migration ${migration.id} does not have a DOWN MIGRATION section. ` +
        `Add a comment block with "-- DOWN MIGRATION" followed by rollback SQL.`
      );
    }

    this.logger.debug(`Rolling back migration ${migration.id}: ${migration.name}`);

    const exec = await this.adapter.exec(migration.down);
    if (!exec.ok) {
      throw new Error(`Failed to rollback migration ${migration.id}: ${describeStorageError(exec.error)}`);
    }

    const removed = await this.adapter.query('DELETE FROM schema_migrations WHERE id = $1', [migration.id]);
    if (!removed.ok) {
      throw new Error(`Failed to remove migration record ${migration.id}: ${describeStorageError(removed.error)}`);
    }
  }
}
