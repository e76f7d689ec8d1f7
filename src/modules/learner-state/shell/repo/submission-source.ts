/**
 * Submission Source - Kysely Implementation
 *
 * Read-only view over the submissions table.
 */

import { ok, err, type Result } from 'neverthrow';

import { createUpstreamUnavailableError, type LearnerStateError } from '../../core/errors.js';

import type { SubmissionSource } from '../../core/ports.js';
import type { SubmissionEvent } from '../../core/types.js';
import type { LearnerDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

export interface SubmissionSourceOptions {
  db: LearnerDbClient;
  logger: Logger;
}

interface SubmissionRow {
  id: string;
  question_id: string;
  topics: string[];
  success: boolean;
  error_pattern: string | null;
  quality: number | null;
  created_at: Date;
}

class KyselySubmissionSource implements SubmissionSource {
  private readonly db: LearnerDbClient;
  private readonly log: Logger;

  constructor(options: SubmissionSourceOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'submission-source' });
  }

  async listSubmissions(userId: string): Promise<Result<SubmissionEvent[], LearnerStateError>> {
    try {
      const rows = await this.db
        .selectFrom('submissions')
        .select(['id', 'question_id', 'topics', 'success', 'error_pattern', 'quality', 'created_at'])
        .where('user_id', '=', userId)
        .orderBy('created_at', 'asc')
        .orderBy('id', 'asc')
        .execute();

      return ok(rows.map((row) => this.mapRowToEvent(row)));
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to list submissions');
      return err(createUpstreamUnavailableError('submissions', 'Failed to list submissions', error));
    }
  }

  async hasPriorSuccess(
    userId: string,
    event: SubmissionEvent
  ): Promise<Result<boolean, LearnerStateError>> {
    const occurredAt = new Date(event.occurredAt);

    try {
      const row = await this.db
        .selectFrom('submissions')
        .select('id')
        .where('user_id', '=', userId)
        .where('question_id', '=', event.questionId)
        .where('success', '=', true)
        .where((eb) =>
          eb.or([
            eb('created_at', '<', occurredAt),
            eb.and([eb('created_at', '=', occurredAt), eb('id', '<', event.submissionId)]),
          ])
        )
        .limit(1)
        .executeTakeFirst();

      return ok(row !== undefined);
    } catch (error) {
      this.log.error(
        { err: error, userId, questionId: event.questionId },
        'Failed to check prior success'
      );
      return err(
        createUpstreamUnavailableError('submissions', 'Failed to check prior success', error)
      );
    }
  }

  private mapRowToEvent(row: SubmissionRow): SubmissionEvent {
    return {
      submissionId: row.id,
      questionId: row.question_id,
      topics: row.topics,
      success: row.success,
      occurredAt: row.created_at.toISOString(),
      ...(row.error_pattern !== null && { errorPattern: row.error_pattern }),
      ...(row.quality !== null && { quality: row.quality }),
    };
  }
}

/**
 * Creates a submission source backed by the submissions table.
 */
export const makeSubmissionSource = (options: SubmissionSourceOptions): SubmissionSource => {
  return new KyselySubmissionSource(options);
};
