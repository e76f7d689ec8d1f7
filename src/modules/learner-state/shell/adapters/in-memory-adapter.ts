/**
 * In-Memory Learner State Adapters
 *
 * Implements the persistence gateway, submission source and topic resolver
 * over plain maps. Used by tests and by the engine when no DATABASE_URL is
 * configured.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createConflictError,
  type LearnerStateError,
  type UpstreamUnavailableError,
} from '../../core/errors.js';
import { compareSubmissions } from '../../core/recalculate.js';

import type {
  LearnerStateRepository,
  StoredLearnerState,
  SubmissionSource,
  TopicResolver,
} from '../../core/ports.js';
import type { LearnerState, SubmissionEvent } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Learner State Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating an in-memory learner state repository.
 */
export interface MakeInMemoryLearnerStateRepoOptions {
  /** States present before the first call, stored at version 1 */
  initialStates?: Map<string, LearnerState>;

  /**
   * Called before every store is checked against the current version.
   * Lets tests write underneath the caller to simulate a concurrent writer.
   */
  beforeStore?: (userId: string, repo: InMemoryLearnerStateRepository) => void;

  /** Returned by every call instead of touching the map */
  failWith?: UpstreamUnavailableError;
}

export interface InMemoryLearnerStateRepository extends LearnerStateRepository {
  /** Writes a state unconditionally, bumping its version */
  put(userId: string, state: LearnerState): number;

  /** Current stored entry, without going through the port */
  peek(userId: string): StoredLearnerState | undefined;

  /** Number of store calls, successful or not */
  readonly storeCalls: number;
}

/**
 * Creates an in-memory learner state repository.
 *
 * @example
 * const repo = makeInMemoryLearnerStateRepo({
 *   // Another writer gets in before the first store
 *   beforeStore: (userId, self) => {
 *     if (self.storeCalls === 1) self.put(userId, otherState);
 *   },
 * });
 */
export const makeInMemoryLearnerStateRepo = (
  options: MakeInMemoryLearnerStateRepoOptions = {}
): InMemoryLearnerStateRepository => {
  const entries = new Map<string, StoredLearnerState>();
  for (const [userId, state] of options.initialStates ?? []) {
    entries.set(userId, { state, version: 1 });
  }

  let storeCalls = 0;

  const put = (userId: string, state: LearnerState): number => {
    const version = (entries.get(userId)?.version ?? 0) + 1;
    entries.set(userId, { state: structuredClone(state), version });
    return version;
  };

  const repo: InMemoryLearnerStateRepository = {
    get storeCalls() {
      return storeCalls;
    },

    put,

    peek(userId) {
      return entries.get(userId);
    },

    async load(userId): Promise<Result<StoredLearnerState | null, LearnerStateError>> {
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }
      const entry = entries.get(userId);
      if (entry === undefined) {
        return ok(null);
      }
      return ok({ state: structuredClone(entry.state), version: entry.version });
    },

    async store(userId, state, expectedVersion): Promise<Result<number, LearnerStateError>> {
      storeCalls += 1;
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }

      options.beforeStore?.(userId, repo);

      const currentVersion = entries.get(userId)?.version ?? null;
      if (currentVersion !== expectedVersion) {
        return err(createConflictError(userId, 0));
      }

      return ok(put(userId, state));
    },
  };

  return repo;
};

// ─────────────────────────────────────────────────────────────────────────────
// Submission Source
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeInMemorySubmissionSourceOptions {
  /** Submissions per user, in any order */
  submissions?: Map<string, SubmissionEvent[]>;
  failWith?: UpstreamUnavailableError;
}

export interface InMemorySubmissionSource extends SubmissionSource {
  /** Appends a submission to a user's log */
  record(userId: string, event: SubmissionEvent): void;
}

/**
 * Creates an in-memory submissions log.
 */
export const makeInMemorySubmissionSource = (
  options: MakeInMemorySubmissionSourceOptions = {}
): InMemorySubmissionSource => {
  const logs = new Map<string, SubmissionEvent[]>();
  for (const [userId, events] of options.submissions ?? []) {
    logs.set(userId, [...events]);
  }

  return {
    record(userId, event) {
      const log = logs.get(userId) ?? [];
      log.push(event);
      logs.set(userId, log);
    },

    async listSubmissions(userId): Promise<Result<SubmissionEvent[], LearnerStateError>> {
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }
      return ok([...(logs.get(userId) ?? [])].sort(compareSubmissions));
    },

    async hasPriorSuccess(userId, event): Promise<Result<boolean, LearnerStateError>> {
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }
      const prior = (logs.get(userId) ?? []).some(
        (candidate) =>
          candidate.success &&
          candidate.questionId === event.questionId &&
          compareSubmissions(candidate, event) < 0
      );
      return ok(prior);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Topic Resolver
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeInMemoryTopicResolverOptions {
  /** Question ID -> raw topic tags */
  questions?: Map<string, string[]>;
  failWith?: UpstreamUnavailableError;
}

/**
 * Creates an in-memory question topic lookup.
 */
export const makeInMemoryTopicResolver = (
  options: MakeInMemoryTopicResolverOptions = {}
): TopicResolver => {
  const questions = options.questions ?? new Map<string, string[]>();

  return {
    async resolveTopics(questionId): Promise<Result<string[], LearnerStateError>> {
      if (options.failWith !== undefined) {
        return err(options.failWith);
      }
      return ok([...(questions.get(questionId) ?? [])]);
    },
  };
};
