/**
 * Storage entry point - picks a backend and opens the persistent store
 */

import { consoleLogger, type Logger } from '@campaign-agent/shared';
import { PostgresAdapter, PostgresConfig } from './postgres.js';
import { SqliteAdapter, SqliteConfig } from './sqlite.js';
import { StorageAdapter } from './adapter.js';
import { ConversationStore } from './conversation-store.js';
import { MigrationRunner } from './migrations/migration-runner.js';

/**
 * Configuration for the persistent store. Exactly one backend is used;
 * SQLite wins when both are given.
 */
export interface StorageConfig {
  postgres?: PostgresConfig;
  sqlite?: SqliteConfig;
  /** Apply pending migrations on open (default true) */
  migrate?: boolean;
  logger?: Logger;
}

export interface OpenedStorage {
  adapter: StorageAdapter;
  conversations: ConversationStore;
}

export function createStorageAdapter(config: StorageConfig): StorageAdapter {
  if (config.sqlite) {
    return new SqliteAdapter(config.sqlite);
  }
  if (config.postgres) {
    return new PostgresAdapter(config.postgres);
  }
  throw new Error('Either postgres or sqlite config must be provided');
}

/**
 * Parse a `sqlite://path` storage URL. `sqlite://:memory:` opens an in-memory database.
 */
export function parseStorageUrl(url: string): StorageConfig {
  const match = /^sqlite:\/\/(.+)$/.exec(url.trim());
  if (!match || !match[1]) {
    throw new Error(`Unsupported storage URL: ${url}`);
  }
  return { sqlite: { filename: match[1] } };
}

/**
 * Create the adapter, bring the schema up to date and wrap it in a ConversationStore
 */
export async function openStorage(config: StorageConfig): Promise<OpenedStorage> {
  const logger = config.logger ?? consoleLogger;
  const adapter = createStorageAdapter(config);

  if (config.migrate ?? true) {
    try {
      await new MigrationRunner({ adapter, logger }).up();
    } catch (error) {
      await adapter.close();
      throw error;
    }
  }

  return { adapter, conversations: new ConversationStore({ adapter, logger }) };
}
