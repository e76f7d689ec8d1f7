/**
 * Topic Resolver - Kysely Implementation
 */

import { ok, err, type Result } from 'neverthrow';

import { createUpstreamUnavailableError, type LearnerStateError } from '../../core/errors.js';

import type { TopicResolver } from '../../core/ports.js';
import type { LearnerDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

export interface TopicResolverOptions {
  db: LearnerDbClient;
  logger: Logger;
}

class KyselyTopicResolver implements TopicResolver {
  private readonly db: LearnerDbClient;
  private readonly log: Logger;

  constructor(options: TopicResolverOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'topic-resolver' });
  }

  async resolveTopics(questionId: string): Promise<Result<string[], LearnerStateError>> {
    try {
      const row = await this.db
        .selectFrom('questions')
        .select('topics')
        .where('id', '=', questionId)
        .executeTakeFirst();

      return ok(row?.topics ?? []);
    } catch (error) {
      this.log.error({ err: error, questionId }, 'Failed to resolve question topics');
      return err(createUpstreamUnavailableError('topics', 'Failed to resolve question topics', error));
    }
  }
}

/**
 * Creates a topic resolver backed by the questions table.
 */
export const makeTopicResolver = (options: TopicResolverOptions): TopicResolver => {
  return new KyselyTopicResolver(options);
};
