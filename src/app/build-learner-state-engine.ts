/**
 * Learner state engine factory
 * Composition root: wires adapters, taxonomy and configuration into the
 * use cases and exposes them as one facade.
 */

import { err, ok, type Result } from 'neverthrow';

import { createDatabaseClient, type LearnerDbClient } from '../infra/database/client.js';
import {
  getDueReviews,
  getState,
  getSummary,
  getTopicStatistics,
  recalculateState,
  updateAfterSubmission,
  makeInMemoryLearnerStateRepo,
  makeInMemorySubmissionSource,
  makeInMemoryTopicResolver,
  makeLearnerStateRepo,
  makeSubmissionSource,
  makeTopicResolver,
  loadTopicIndex,
  type LearnerState,
  type LearnerStateError,
  type LearnerStateRepository,
  type LearnerSummary,
  type ReviewItem,
  type SubmissionSource,
  type TopicIndex,
  type TopicResolver,
  type TopicStatistics,
} from '../modules/learner-state/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies of the engine facade
 */
export interface LearnerStateEngineDeps {
  repo: LearnerStateRepository;
  submissions: SubmissionSource;
  topicResolver: TopicResolver;
  topicIndex: TopicIndex;
  logger: Logger;
  /** Load-compute-store attempts before a conflict surfaces */
  maxAttempts?: number;
  /** Half-life of historical evidence when recalculating mastery */
  halfLifeDays?: number;
  /** Clock for the read operations; defaults to the system clock */
  clock?: () => Date;
}

export interface LearnerStateEngine {
  getState(userId: string): Promise<Result<LearnerState, LearnerStateError>>;
  updateAfterSubmission(
    userId: string,
    event: unknown
  ): Promise<Result<LearnerState, LearnerStateError>>;
  recalculate(userId: string): Promise<Result<LearnerState, LearnerStateError>>;
  getTopicStatistics(
    userId: string,
    topic: string
  ): Promise<Result<TopicStatistics, LearnerStateError>>;
  /** `now` defaults to the engine clock */
  getDueReviews(userId: string, now?: Date): Promise<Result<ReviewItem[], LearnerStateError>>;
  getSummary(userId: string, now?: Date): Promise<Result<LearnerSummary, LearnerStateError>>;
}

export interface BuiltLearnerStateEngine {
  engine: LearnerStateEngine;
  /** Releases the database pool, if one was opened */
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Facade
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Binds the use cases to one set of dependencies.
 */
export const makeLearnerStateEngine = (deps: LearnerStateEngineDeps): LearnerStateEngine => {
  const clock = deps.clock ?? (() => new Date());

  return {
    getState: (userId) => getState(deps, { userId }),
    updateAfterSubmission: (userId, event) => updateAfterSubmission(deps, { userId, event }),
    recalculate: (userId) => recalculateState(deps, { userId }),
    getTopicStatistics: (userId, topic) =>
      getTopicStatistics(deps, { userId, topic, now: clock() }),
    getDueReviews: (userId, now) => getDueReviews(deps, { userId, now: now ?? clock() }),
    getSummary: (userId, now) => getSummary(deps, { userId, now: now ?? clock() }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Composition Root
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the engine from configuration. Uses Postgres when a database URL
 * is configured and in-memory adapters otherwise.
 */
export const buildLearnerStateEngine = async (
  config: AppConfig,
  logger: Logger
): Promise<Result<BuiltLearnerStateEngine, LearnerStateError>> => {
  const indexResult = await loadTopicIndex(config.learnerState.topicTaxonomyPath);
  if (indexResult.isErr()) {
    logger.error(
      { path: config.learnerState.topicTaxonomyPath, error: indexResult.error },
      'Failed to load topic taxonomy'
    );
    return err(indexResult.error);
  }
  const topicIndex = indexResult.value;
  logger.debug({ topics: topicIndex.aliases.size }, 'Topic taxonomy loaded');

  let db: LearnerDbClient | undefined;
  let adapters: Pick<LearnerStateEngineDeps, 'repo' | 'submissions' | 'topicResolver'>;

  if (config.database.url !== undefined) {
    db = createDatabaseClient({ connectionString: config.database.url });
    adapters = {
      repo: makeLearnerStateRepo({ db, logger }),
      submissions: makeSubmissionSource({ db, logger }),
      topicResolver: makeTopicResolver({ db, logger }),
    };
  } else {
    logger.warn('DATABASE_URL not set; learner state is kept in memory');
    adapters = {
      repo: makeInMemoryLearnerStateRepo(),
      submissions: makeInMemorySubmissionSource(),
      topicResolver: makeInMemoryTopicResolver(),
    };
  }

  const engine = makeLearnerStateEngine({
    ...adapters,
    topicIndex,
    logger,
    maxAttempts: config.learnerState.maxWriteAttempts,
    halfLifeDays: config.learnerState.masteryHalfLifeDays,
  });

  return ok({
    engine,
    close: async () => {
      if (db !== undefined) {
        await db.destroy();
      }
    },
  });
};
