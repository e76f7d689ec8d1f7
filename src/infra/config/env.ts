/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import {
  DEFAULT_MASTERY_HALF_LIFE_DAYS,
  DEFAULT_MAX_WRITE_ATTEMPTS,
} from '../../modules/learner-state/core/types.js';

/** Default location of the topic taxonomy, relative to the working directory */
export const DEFAULT_TOPIC_TAXONOMY_PATH = 'data/topic-taxonomy.yaml';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Persistence (in-memory adapters when absent)
  DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),

  // Learner state engine
  LEARNER_STATE_MAX_RETRIES: Type.Integer({
    default: DEFAULT_MAX_WRITE_ATTEMPTS,
    minimum: 1,
    maximum: 10,
  }),
  MASTERY_HALF_LIFE_DAYS: Type.Number({
    default: DEFAULT_MASTERY_HALF_LIFE_DAYS,
    exclusiveMinimum: 0,
  }),
  TOPIC_TAXONOMY_PATH: Type.String({ minLength: 1, default: DEFAULT_TOPIC_TAXONOMY_PATH }),
});

export type Env = Static<typeof EnvSchema>;

const parseNumber = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'] !== '' ? env['DATABASE_URL'] : undefined,
    LEARNER_STATE_MAX_RETRIES: parseNumber(
      env['LEARNER_STATE_MAX_RETRIES'],
      DEFAULT_MAX_WRITE_ATTEMPTS
    ),
    MASTERY_HALF_LIFE_DAYS: parseNumber(
      env['MASTERY_HALF_LIFE_DAYS'],
      DEFAULT_MASTERY_HALF_LIFE_DAYS
    ),
    TOPIC_TAXONOMY_PATH: env['TOPIC_TAXONOMY_PATH'] ?? DEFAULT_TOPIC_TAXONOMY_PATH,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  env: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  learnerState: {
    /** Load-compute-store attempts before a write conflict surfaces */
    maxWriteAttempts: env.LEARNER_STATE_MAX_RETRIES,
    /** Half-life of historical evidence when recalculating mastery */
    masteryHalfLifeDays: env.MASTERY_HALF_LIFE_DAYS,
    topicTaxonomyPath: env.TOPIC_TAXONOMY_PATH,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
