/**
 * Learner State Module - Domain Types
 *
 * The compact model of what a learner knows, derived from submission events:
 * per-topic mastery, recent error patterns, a spaced-repetition schedule and
 * a daily engagement streak.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Schema version tag written into every state document */
export const LEARNER_STATE_VERSION = '1.0';

/** Mastery bounds */
export const MASTERY_MIN = 0;
export const MASTERY_MAX = 1;

/** Fraction of the remaining gap to 1.0 gained on a successful attempt */
export const MASTERY_SUCCESS_GAIN = 0.1;

/** Fraction of current mastery lost on a failed attempt */
export const MASTERY_FAILURE_DECAY = 0.15;

/** Default half-life (days) of historical evidence when rebuilding mastery */
export const DEFAULT_MASTERY_HALF_LIFE_DAYS = 14;

/** Error patterns kept per topic (most recent first) */
export const MAX_ERROR_PATTERNS_PER_TOPIC = 3;

/** SM-2 ease factor bounds; new items start at the maximum */
export const MIN_EASE_FACTOR = 1.3;
export const MAX_EASE_FACTOR = 2.5;
export const DEFAULT_EASE_FACTOR = MAX_EASE_FACTOR;

/** Interval for an item scheduled on its first success */
export const FIRST_REVIEW_INTERVAL_DAYS = 1;

/** Interval for an absent item solved again (its previous review was cleared) */
export const REENTRY_REVIEW_INTERVAL_DAYS = 3;

/** Interval after a failed review */
export const RESET_REVIEW_INTERVAL_DAYS = 1;

/** Upper bound on review intervals */
export const MAX_REVIEW_INTERVAL_DAYS = 365;

/** SM-2 recall quality range */
export const MIN_REVIEW_QUALITY = 0;
export const MAX_REVIEW_QUALITY = 5;

/** Topics below this mastery are flagged for review */
export const NEEDS_REVIEW_MASTERY_THRESHOLD = 0.7;

/** Topics not practiced for more than this many days are flagged for review */
export const STALE_PRACTICE_DAYS = 7;

/** Number of strongest / weakest topics reported in a summary */
export const SUMMARY_TOPIC_COUNT = 3;

/** Default number of load-compute-store attempts before a conflict surfaces */
export const DEFAULT_MAX_WRITE_ATTEMPTS = 3;

// ─────────────────────────────────────────────────────────────────────────────
// Value Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Calendar date in UTC (YYYY-MM-DD).
 */
export type IsoDate = string;

/**
 * ISO 8601 timestamp, normalized to `Date.prototype.toISOString()` form.
 */
export type IsoTimestamp = string;

/**
 * A labeled mistake made on a failed attempt. Immutable once created.
 */
export interface ErrorPattern {
  readonly topic: string;
  /** Free-form tag, e.g. "off-by-one" */
  readonly pattern: string;
  /** Question the mistake was made on */
  readonly questionId: string;
  readonly occurredAt: IsoTimestamp;
}

/**
 * A question scheduled for spaced-repetition review.
 *
 * Invariants: easeFactor in [1.3, 2.5], intervalDays >= 1, dueDate never
 * moves backwards across successful reviews.
 */
export interface ReviewItem {
  questionId: string;
  topics: string[];
  dueDate: IsoTimestamp;
  intervalDays: number;
  easeFactor: number;
}

/**
 * The learner state document.
 *
 * `mastery` and `commonErrors` are keyed by topic. A missing key means the
 * topic was never observed, which is different from a score of zero.
 */
export interface LearnerState {
  /** Schema version tag */
  version: string;
  /** Timestamp of the latest event folded into this state */
  updated: IsoTimestamp | null;
  /** Topic -> mastery in [0, 1] */
  mastery: Record<string, number>;
  /** Topic -> up to 3 error patterns, most recent first */
  commonErrors: Record<string, ErrorPattern[]>;
  /** Review schedule, unique by questionId */
  reviews: ReviewItem[];
  /** Consecutive active days */
  streak: number;
  /** Most recent activity date */
  lastSeen: IsoDate | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One attempt at a question, as read from the submissions log.
 *
 * `topics` may be empty when the log does not embed them; the topic resolver
 * fills them in before the event reaches the pipeline.
 */
export interface SubmissionEvent {
  submissionId: string;
  questionId: string;
  topics: string[];
  success: boolean;
  occurredAt: IsoTimestamp;
  /** Mistake label for failed attempts */
  errorPattern?: string;
  /** SM-2 recall quality (0-5) for successful reviews */
  quality?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only aggregation over one topic.
 */
export interface TopicStatistics {
  topic: string;
  displayName: string;
  attempts: number;
  successes: number;
  /** Distinct questions with at least one success */
  problemsSolved: number;
  /** successes / attempts, 0 when there are no attempts */
  successRate: number;
  /** Current mastery, null when the topic was never observed */
  mastery: number | null;
  lastPracticedAt: IsoTimestamp | null;
  needsReview: boolean;
  errorPatterns: ErrorPattern[];
}

export interface TopicMasteryEntry {
  topic: string;
  mastery: number;
}

/**
 * Dashboard-style overview of a learner.
 */
export interface LearnerSummary {
  topicsPracticed: number;
  averageMastery: number;
  currentStreak: number;
  reviewsDue: number;
  strongestTopics: TopicMasteryEntry[];
  needsImprovement: TopicMasteryEntry[];
}
