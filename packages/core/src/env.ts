import { z } from 'zod';

import { defaultLogLevel } from './logger/index.js';

/**
 * Environment Variable Validation
 * Parses the environment once at boot into an explicit configuration struct.
 * Components built from the struct take every setting from it; only the
 * standalone default logger still falls back to process.env.
 */

const BooleanString = z
  .enum(['true', 'false'])
  .optional()
  .default('false')
  .transform((v) => v === 'true');

const PositiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().positive());

// Base server config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  SERVICE_NAME: z.string().min(1).default('rateboard'),
});

// Storage config
const DatabaseEnvSchema = z.object({
  DATABASE_DRIVER: z.enum(['postgres', 'mysql', 'memory']).default('postgres'),
  DATABASE_URL: z.string().url().optional(),
  MYSQL_HOST: z.string().optional(),
  MYSQL_PORT: PositiveInt('3306'),
  MYSQL_USER: z.string().optional(),
  MYSQL_PASSWORD: z.string().optional(),
  MYSQL_DATABASE: z.string().optional(),
  DATABASE_POOL_MAX: PositiveInt('10'),
  DATABASE_IDLE_TIMEOUT_MS: PositiveInt('30000'),
  DATABASE_CONNECTION_TIMEOUT_MS: PositiveInt('5000'),
  DATABASE_QUERY_TIMEOUT_MS: PositiveInt('30000'),
  DATABASE_SSL: BooleanString,
});

// Domain behaviour
const DomainEnvSchema = z.object({
  REVIEW_EDIT_POLICY: z.enum(['open', 'author-only']).default('open'),
});

export const RatingsEnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema)
  .merge(DomainEnvSchema)
  .superRefine((env, ctx) => {
    if (env.DATABASE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required for the postgres driver',
      });
    }

    if (env.DATABASE_DRIVER === 'mysql' && !env.DATABASE_URL) {
      for (const key of ['MYSQL_HOST', 'MYSQL_USER', 'MYSQL_DATABASE'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required for the mysql driver when DATABASE_URL is unset`,
          });
        }
      }
    }

    if (env.DATABASE_DRIVER === 'memory' && env.NODE_ENV === 'production') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_DRIVER'],
        message: 'The memory driver cannot be used in production',
      });
    }
  });

export type RatingsEnv = z.infer<typeof RatingsEnvSchema>;

export type LogLevel = NonNullable<RatingsEnv['LOG_LEVEL']>;
export type DatabaseDriver = RatingsEnv['DATABASE_DRIVER'];
export type ReviewEditPolicy = RatingsEnv['REVIEW_EDIT_POLICY'];

export interface MySqlConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string | undefined;
  readonly database: string;
}

export interface DatabaseConfig {
  readonly driver: DatabaseDriver;
  /** Connection URL; takes precedence over the discrete MySQL settings */
  readonly url: string | undefined;
  readonly mysql: MySqlConnectionConfig | undefined;
  readonly poolMax: number;
  readonly idleTimeoutMs: number;
  readonly connectionTimeoutMs: number;
  readonly queryTimeoutMs: number;
  readonly ssl: boolean;
}

export interface RatingsConfig {
  readonly nodeEnv: RatingsEnv['NODE_ENV'];
  /** LOG_LEVEL, else info in production, silent under test and debug elsewhere */
  readonly logLevel: LogLevel;
  readonly serviceName: string;
  readonly database: DatabaseConfig;
  readonly reviewEditPolicy: ReviewEditPolicy;
}

function toMySqlConfig(env: RatingsEnv): MySqlConnectionConfig | undefined {
  if (!env.MYSQL_HOST || !env.MYSQL_USER || !env.MYSQL_DATABASE) {
    return undefined;
  }
  return Object.freeze({
    host: env.MYSQL_HOST,
    port: env.MYSQL_PORT,
    user: env.MYSQL_USER,
    password: env.MYSQL_PASSWORD,
    database: env.MYSQL_DATABASE,
  });
}

/**
 * Validate the environment and build the configuration struct
 *
 * @throws Error listing every failing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RatingsConfig {
  const result = RatingsEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  const parsed = result.data;

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL ?? defaultLogLevel(parsed.NODE_ENV),
    serviceName: parsed.SERVICE_NAME,
    reviewEditPolicy: parsed.REVIEW_EDIT_POLICY,
    database: Object.freeze({
      driver: parsed.DATABASE_DRIVER,
      url: parsed.DATABASE_URL,
      mysql: toMySqlConfig(parsed),
      poolMax: parsed.DATABASE_POOL_MAX,
      idleTimeoutMs: parsed.DATABASE_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: parsed.DATABASE_CONNECTION_TIMEOUT_MS,
      queryTimeoutMs: parsed.DATABASE_QUERY_TIMEOUT_MS,
      ssl: parsed.DATABASE_SSL,
    }),
  });
}

