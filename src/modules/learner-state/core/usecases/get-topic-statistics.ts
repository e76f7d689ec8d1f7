/**
 * Get Topic Statistics Use Case
 *
 * Joins the learner's state with their submissions log for one topic.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type LearnerStateError } from '../errors.js';
import { createEmptyLearnerState } from '../pipeline.js';
import { getTopicStatistics as aggregateTopicStatistics } from '../queries.js';
import { mapTagToTopic } from '../topics.js';
import { resolveEventTopics } from './resolve-event-topics.js';

import type { LearnerStateRepository, SubmissionSource, TopicResolver } from '../ports.js';
import type { TopicIndex } from '../topics.js';
import type { TopicStatistics } from '../types.js';
import type { Logger } from 'pino';

export interface GetTopicStatisticsDeps {
  repo: LearnerStateRepository;
  submissions: SubmissionSource;
  topicResolver: TopicResolver;
  topicIndex: TopicIndex;
  logger: Logger;
}

export interface GetTopicStatisticsInput {
  userId: string;
  /** Raw topic name; mapped through the taxonomy before lookup */
  topic: string;
  now: Date;
}

export async function getTopicStatistics(
  deps: GetTopicStatisticsDeps,
  input: GetTopicStatisticsInput
): Promise<Result<TopicStatistics, LearnerStateError>> {
  const { repo, submissions, topicIndex } = deps;
  const { userId, now } = input;

  if (input.topic.trim() === '') {
    return err(createInvalidInputError('Topic must not be blank', 'topic'));
  }
  const topic = mapTagToTopic(input.topic, topicIndex);

  const loadResult = await repo.load(userId);
  if (loadResult.isErr()) {
    return err(loadResult.error);
  }

  const historyResult = await submissions.listSubmissions(userId);
  if (historyResult.isErr()) {
    return err(historyResult.error);
  }

  const resolveResult = await resolveEventTopics(deps, historyResult.value);
  if (resolveResult.isErr()) {
    return err(resolveResult.error);
  }

  const state = loadResult.value?.state ?? createEmptyLearnerState();
  return ok(aggregateTopicStatistics(state, resolveResult.value, topic, now));
}
