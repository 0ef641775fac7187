/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters implementing the RatingsRepository port, the schema migrations
 * for each dialect and the composition root.
 *
 * @module @rateboard/infrastructure
 *
 * ## Architecture Overview
 *
 * ```
 *    DOMAIN LAYER                         INFRASTRUCTURE LAYER
 *   ┌─────────────────┐                  ┌──────────────────────────┐
 *   │                 │                  │  SqlRatingsRepository    │
 *   │  Ratings        │                  │   ├─ Postgres (pg)       │
 *   │  Repository     │─────implements──▶│   └─ MySQL (mysql2)      │
 *   │  (Port)         │                  │                          │
 *   │                 │─────implements──▶│  InMemoryRatings         │
 *   └─────────────────┘                  │  Repository              │
 *                                        └──────────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { loadConfig } from '@rateboard/core';
 * import { createRatingsModule, createMigrationManager, loadMigrationFiles } from '@rateboard/infrastructure';
 *
 * const ratings = createRatingsModule(loadConfig());
 * if (ratings.pool) {
 *   await createMigrationManager({ pool: ratings.pool }).run(await loadMigrationFiles(ratings.pool.dialect));
 * }
 * ```
 */

export * from './repositories/index.js';

export {
  createRatingsRepository,
  createRatingsModule,
  type RatingsStorage,
  type RatingsModule,
} from './composition.js';

export {
  computeChecksum,
  parseMigrationFiles,
  splitStatements,
  loadMigrationFiles,
  createMigrationManager,
  MIGRATIONS_ROOT,
  type MigrationFile,
  type MigrationRecord,
  type MigrationResult,
  type MigrationSummary,
  type ChecksumMismatch,
  type MigrationConfig,
  type MigrationManager,
} from './migrations.js';
