/**
 * Learner State Module - Ports (Interfaces)
 *
 * The collaborators the core talks to. These define WHAT we need, not HOW
 * it's implemented; the persistence gateway is the only suspension point.
 */

import type { LearnerStateError } from './errors.js';
import type { LearnerState, SubmissionEvent } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Persistence Gateway
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A state document together with the concurrency token it was read at.
 */
export interface StoredLearnerState {
  state: LearnerState;
  /** Monotonic write counter, bumped on every successful store */
  version: number;
}

/**
 * Keyed load/store of learner state documents with optimistic concurrency.
 */
export interface LearnerStateRepository {
  /**
   * Load a learner's state. Returns null if none was ever stored.
   */
  load(userId: string): Promise<Result<StoredLearnerState | null, LearnerStateError>>;

  /**
   * Store a learner's state if the stored version still equals
   * `expectedVersion` (null: only if nothing is stored yet).
   *
   * @returns the new version, or a ConflictError when another writer won
   */
  store(
    userId: string,
    state: LearnerState,
    expectedVersion: number | null
  ): Promise<Result<number, LearnerStateError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Submission Source
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read access to the external submissions log.
 */
export interface SubmissionSource {
  /**
   * All submissions of a learner, ordered by occurredAt ascending.
   */
  listSubmissions(userId: string): Promise<Result<SubmissionEvent[], LearnerStateError>>;

  /**
   * Whether the learner solved the event's question in an earlier
   * submission (earlier occurredAt, or same occurredAt and lower
   * submissionId).
   */
  hasPriorSuccess(
    userId: string,
    event: SubmissionEvent
  ): Promise<Result<boolean, LearnerStateError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Topic Resolver
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lookup from question to its raw topic tags.
 */
export interface TopicResolver {
  /**
   * Returns the question's tags, or an empty list for an unknown question.
   */
  resolveTopics(questionId: string): Promise<Result<string[], LearnerStateError>>;
}
