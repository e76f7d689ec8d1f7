/**
 * Resolve Event Topics
 *
 * Fills in topics for submissions that do not embed them and normalizes
 * every topic set against the taxonomy.
 */

import { err, ok, type Result } from 'neverthrow';

import { normalizeTopics, type TopicIndex } from '../topics.js';

import type { LearnerStateError } from '../errors.js';
import type { TopicResolver } from '../ports.js';
import type { SubmissionEvent } from '../types.js';
import type { Logger } from 'pino';

export interface ResolveEventTopicsDeps {
  topicResolver: TopicResolver;
  topicIndex: TopicIndex;
  logger: Logger;
}

/**
 * Returns the events with normalized topics. Each question is looked up at
 * most once; a resolver failure aborts the whole batch.
 */
export async function resolveEventTopics(
  deps: ResolveEventTopicsDeps,
  events: readonly SubmissionEvent[]
): Promise<Result<SubmissionEvent[], LearnerStateError>> {
  const { topicResolver, topicIndex, logger } = deps;
  const resolved = new Map<string, string[]>();
  const result: SubmissionEvent[] = [];

  for (const event of events) {
    let rawTopics = event.topics;

    if (rawTopics.length === 0) {
      const cached = resolved.get(event.questionId);
      if (cached !== undefined) {
        rawTopics = cached;
      } else {
        const lookup = await topicResolver.resolveTopics(event.questionId);
        if (lookup.isErr()) {
          return err(lookup.error);
        }
        rawTopics = lookup.value;
        resolved.set(event.questionId, rawTopics);
      }
    }

    const topics = normalizeTopics(rawTopics, topicIndex);
    if (topics.length === 0) {
      logger.warn({ questionId: event.questionId }, 'No topics found for question');
    }

    result.push({ ...event, topics });
  }

  return ok(result);
}
