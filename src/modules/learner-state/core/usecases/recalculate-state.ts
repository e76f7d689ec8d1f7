/**
 * Recalculate State Use Case
 *
 * Rebuilds a learner's state from the submissions log and overwrites the
 * stored one. Used for bootstrap and repair; safe to run repeatedly.
 */

import { err, type Result } from 'neverthrow';

import { writeWithRetry } from '../optimistic-write.js';
import { recalculate } from '../recalculate.js';
import { resolveEventTopics } from './resolve-event-topics.js';

import type { LearnerStateError } from '../errors.js';
import type { LearnerStateRepository, SubmissionSource, TopicResolver } from '../ports.js';
import type { TopicIndex } from '../topics.js';
import type { LearnerState } from '../types.js';
import type { Logger } from 'pino';

export interface RecalculateStateDeps {
  repo: LearnerStateRepository;
  submissions: SubmissionSource;
  topicResolver: TopicResolver;
  topicIndex: TopicIndex;
  logger: Logger;
  maxAttempts?: number;
  halfLifeDays?: number;
}

export interface RecalculateStateInput {
  userId: string;
}

/**
 * Recalculates and stores a learner's state.
 *
 * The new state depends only on the history, so a conflict retry just
 * reloads the version and writes the same state again.
 */
export async function recalculateState(
  deps: RecalculateStateDeps,
  input: RecalculateStateInput
): Promise<Result<LearnerState, LearnerStateError>> {
  const { repo, submissions, logger } = deps;
  const { userId } = input;

  const log = logger.child({ usecase: 'recalculateState' });

  const historyResult = await submissions.listSubmissions(userId);
  if (historyResult.isErr()) {
    log.error({ userId, error: historyResult.error }, 'Failed to load submission history');
    return err(historyResult.error);
  }

  const resolveResult = await resolveEventTopics({ ...deps, logger: log }, historyResult.value);
  if (resolveResult.isErr()) {
    return err(resolveResult.error);
  }

  const state = recalculate(resolveResult.value, { halfLifeDays: deps.halfLifeDays });

  const writeResult = await writeWithRetry(
    { repo, logger: log, maxAttempts: deps.maxAttempts },
    userId,
    () => state
  );

  if (writeResult.isOk()) {
    log.info(
      {
        userId,
        submissions: resolveResult.value.length,
        topics: Object.keys(state.mastery).length,
        reviews: state.reviews.length,
      },
      'Learner state recalculated'
    );
  }

  return writeResult;
}
