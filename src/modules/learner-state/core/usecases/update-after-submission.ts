/**
 * Update After Submission Use Case
 *
 * Folds one submission into the learner's stored state under optimistic
 * concurrency. Concurrent submissions for the same learner are serialized
 * by the version check; the losing writer reloads and reapplies.
 */

import { err, type Result } from 'neverthrow';

import { writeWithRetry } from '../optimistic-write.js';
import { applySubmission, createEmptyLearnerState } from '../pipeline.js';
import { validateSubmissionEvent } from '../schemas.js';
import { resolveEventTopics } from './resolve-event-topics.js';

import type { LearnerStateError } from '../errors.js';
import type { LearnerStateRepository, SubmissionSource, TopicResolver } from '../ports.js';
import type { TopicIndex } from '../topics.js';
import type { LearnerState } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UpdateAfterSubmissionDeps {
  repo: LearnerStateRepository;
  submissions: SubmissionSource;
  topicResolver: TopicResolver;
  topicIndex: TopicIndex;
  logger: Logger;
  maxAttempts?: number;
}

export interface UpdateAfterSubmissionInput {
  userId: string;
  /** Raw event; validated before anything is loaded */
  event: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Updates a learner's state after a submission.
 *
 * - Validates the event (InvalidInputError on malformed input)
 * - Resolves topics when the event carries none
 * - Checks the submissions log for an earlier success on the same question
 * - Runs the update pipeline and stores the result, retrying on conflicts
 *
 * @returns the state as written
 */
export async function updateAfterSubmission(
  deps: UpdateAfterSubmissionDeps,
  input: UpdateAfterSubmissionInput
): Promise<Result<LearnerState, LearnerStateError>> {
  const { repo, submissions, logger } = deps;
  const { userId } = input;

  const log = logger.child({ usecase: 'updateAfterSubmission' });

  const validation = validateSubmissionEvent(input.event);
  if (validation.isErr()) {
    log.warn({ userId, details: validation.error.details }, 'Rejected invalid submission event');
    return err(validation.error);
  }

  const resolveResult = await resolveEventTopics({ ...deps, logger: log }, [validation.value]);
  if (resolveResult.isErr()) {
    return err(resolveResult.error);
  }

  const event = resolveResult.value[0] ?? validation.value;

  let isFirstSuccess = false;
  if (event.success) {
    const priorResult = await submissions.hasPriorSuccess(userId, event);
    if (priorResult.isErr()) {
      return err(priorResult.error);
    }
    isFirstSuccess = !priorResult.value;
  }

  const writeResult = await writeWithRetry(
    { repo, logger: log, maxAttempts: deps.maxAttempts },
    userId,
    (current) => applySubmission(current ?? createEmptyLearnerState(), event, { isFirstSuccess })
  );

  if (writeResult.isOk()) {
    log.info(
      {
        userId,
        questionId: event.questionId,
        success: event.success,
        topics: event.topics,
        streak: writeResult.value.streak,
      },
      'Learner state updated'
    );
  }

  return writeResult;
}
