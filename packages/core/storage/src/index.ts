/**
 * Storage Layer - Main exports
 */

export * from './models.js';
export * from './errors.js';
export * from './adapter.js';
export * from './client.js';
export * from './postgres.js';
export * from './sqlite.js';
export * from './conversation-store.js';
export * from './session-store.js';
export {
  MigrationRunner,
  parseMigration,
  type MigrationConfig,
  type Migration,
  type MigrationStatus,
} from './migrations/migration-runner.js';
