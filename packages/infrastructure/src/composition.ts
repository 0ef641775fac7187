/**
 * @fileoverview Composition Root
 *
 * Builds the repository adapter selected by DATABASE_DRIVER and the rating
 * service on top of it.
 *
 * @module @rateboard/infrastructure/composition
 */

import {
  createChildLogger,
  createLogger,
  createMySqlPool,
  createPostgresPool,
  type Logger,
  type RatingsConfig,
  type SqlPool,
} from '@rateboard/core';
import type { RatingsRepository } from '@rateboard/domain';
import { RatingService } from '@rateboard/application';

import { InMemoryRatingsRepository } from './repositories/InMemoryRatingsRepository.js';
import { MySqlRatingsRepository } from './repositories/MySqlRatingsRepository.js';
import { PostgresRatingsRepository } from './repositories/PostgresRatingsRepository.js';

export interface RatingsStorage {
  repository: RatingsRepository;
  /** Undefined for the memory driver */
  pool: SqlPool | undefined;
}

export interface RatingsModule extends RatingsStorage {
  service: RatingService;
  logger: Logger;
  /** Close the connection pool, if any */
  close(): Promise<void>;
}

function createModuleLogger(config: RatingsConfig): Logger {
  return createLogger({
    name: 'ratings',
    serviceName: config.serviceName,
    level: config.logLevel,
    environment: config.nodeEnv,
  });
}

/**
 * Create the repository for the configured driver
 */
export function createRatingsRepository(config: RatingsConfig, logger?: Logger): RatingsStorage {
  const log = logger ?? createModuleLogger(config);
  const repositoryLogger = createChildLogger(log, { component: 'repository' });

  switch (config.database.driver) {
    case 'postgres': {
      const pool = createPostgresPool(config.database, log);
      return {
        repository: new PostgresRatingsRepository({ pool, logger: repositoryLogger }),
        pool,
      };
    }
    case 'mysql': {
      const pool = createMySqlPool(config.database, log);
      return {
        repository: new MySqlRatingsRepository({ pool, logger: repositoryLogger }),
        pool,
      };
    }
    case 'memory':
      return {
        repository: new InMemoryRatingsRepository({ logger: repositoryLogger }),
        pool: undefined,
      };
  }
}

/**
 * Wire repository and service from one configuration struct
 *
 * @example
 * ```typescript
 * const ratings = createRatingsModule(loadConfig());
 * const result = await ratings.service.getAverageRating(serviceId);
 * await ratings.close();
 * ```
 */
export function createRatingsModule(config: RatingsConfig, logger?: Logger): RatingsModule {
  const log = logger ?? createModuleLogger(config);
  const { repository, pool } = createRatingsRepository(config, log);
  const service = new RatingService({
    repository,
    editPolicy: config.reviewEditPolicy,
    logger: createChildLogger(log, { component: 'rating-service' }),
  });

  log.info(
    { driver: config.database.driver, editPolicy: config.reviewEditPolicy },
    'Ratings module ready'
  );

  return {
    repository,
    pool,
    service,
    logger: log,
    close: async () => {
      await pool?.end();
    },
  };
}
