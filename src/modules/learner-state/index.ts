/**
 * Learner State Module - Public API
 *
 * Mastery, error patterns, review scheduling and streaks per learner,
 * updated incrementally or recalculated from the submissions log.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  IsoDate,
  IsoTimestamp,
  ErrorPattern,
  ReviewItem,
  LearnerState,
  SubmissionEvent,
  TopicStatistics,
  TopicMasteryEntry,
  LearnerSummary,
} from './core/types.js';

export {
  LEARNER_STATE_VERSION,
  MASTERY_MIN,
  MASTERY_MAX,
  MASTERY_SUCCESS_GAIN,
  MASTERY_FAILURE_DECAY,
  DEFAULT_MASTERY_HALF_LIFE_DAYS,
  MAX_ERROR_PATTERNS_PER_TOPIC,
  MIN_EASE_FACTOR,
  MAX_EASE_FACTOR,
  DEFAULT_EASE_FACTOR,
  FIRST_REVIEW_INTERVAL_DAYS,
  REENTRY_REVIEW_INTERVAL_DAYS,
  RESET_REVIEW_INTERVAL_DAYS,
  MAX_REVIEW_INTERVAL_DAYS,
  NEEDS_REVIEW_MASTERY_THRESHOLD,
  DEFAULT_MAX_WRITE_ATTEMPTS,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LearnerStateError,
  ConflictError,
  InvalidInputError,
  UpstreamUnavailableError,
  UpstreamSource,
} from './core/errors.js';

export {
  createConflictError,
  createInvalidInputError,
  createUpstreamUnavailableError,
  getHttpStatusForError,
  LEARNER_STATE_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic (pure)
// ─────────────────────────────────────────────────────────────────────────────

export { updateMastery, initializeFromHistory, clampMastery, recencyWeight } from './core/mastery.js';
export { addErrorPattern, addErrorPatternForTopics } from './core/error-patterns.js';
export {
  scheduleReview,
  resetReview,
  adjustEaseFactor,
  nextIntervalDays,
  type ScheduleReviewOptions,
} from './core/scheduler.js';
export { updateStreak, getEffectiveStreak, type StreakUpdate } from './core/streak.js';
export {
  applySubmission,
  createEmptyLearnerState,
  type ApplySubmissionOptions,
} from './core/pipeline.js';
export { recalculate, compareSubmissions, type RecalculateOptions } from './core/recalculate.js';
export {
  getDueReviews as selectDueReviews,
  getTopicStatistics as aggregateTopicStatistics,
  getLearnerSummary,
  getOverdueDays,
} from './core/queries.js';
export {
  GENERAL_TOPIC,
  normalizeTopic,
  normalizeTopics,
  mapTagToTopic,
  buildTopicIndex,
  getTopicDisplayName,
  type TopicIndex,
  type TopicTaxonomy,
} from './core/topics.js';
export {
  SubmissionEventSchema,
  LearnerStateSchema,
  validateSubmissionEvent,
  validateLearnerState,
  type SubmissionEventInput,
} from './core/schemas.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LearnerStateRepository,
  StoredLearnerState,
  SubmissionSource,
  TopicResolver,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { writeWithRetry, type OptimisticWriteDeps } from './core/optimistic-write.js';

export { getState, type GetStateDeps, type GetStateInput } from './core/usecases/get-state.js';

export {
  updateAfterSubmission,
  type UpdateAfterSubmissionDeps,
  type UpdateAfterSubmissionInput,
} from './core/usecases/update-after-submission.js';

export {
  recalculateState,
  type RecalculateStateDeps,
  type RecalculateStateInput,
} from './core/usecases/recalculate-state.js';

export {
  getTopicStatistics,
  type GetTopicStatisticsDeps,
  type GetTopicStatisticsInput,
} from './core/usecases/get-topic-statistics.js';

export {
  getDueReviews,
  type GetDueReviewsDeps,
  type GetDueReviewsInput,
} from './core/usecases/get-due-reviews.js';

export { getSummary, type GetSummaryDeps, type GetSummaryInput } from './core/usecases/get-summary.js';

export { resolveEventTopics } from './core/usecases/resolve-event-topics.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repositories
// ─────────────────────────────────────────────────────────────────────────────

export { makeLearnerStateRepo, type LearnerStateRepoOptions } from './shell/repo/learner-state-repo.js';
export { makeSubmissionSource, type SubmissionSourceOptions } from './shell/repo/submission-source.js';
export { makeTopicResolver, type TopicResolverOptions } from './shell/repo/topic-resolver.js';
export { loadTopicTaxonomy, loadTopicIndex } from './shell/topics/taxonomy-loader.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - In-Memory Adapters
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeInMemoryLearnerStateRepo,
  makeInMemorySubmissionSource,
  makeInMemoryTopicResolver,
  type InMemoryLearnerStateRepository,
  type InMemorySubmissionSource,
  type MakeInMemoryLearnerStateRepoOptions,
  type MakeInMemorySubmissionSourceOptions,
  type MakeInMemoryTopicResolverOptions,
} from './shell/adapters/in-memory-adapter.js';
