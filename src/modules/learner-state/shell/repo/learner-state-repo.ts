/**
 * Learner State Repository - Kysely Implementation
 *
 * Implements the LearnerStateRepository interface using Kysely.
 * Stores one JSONB state document per user row, guarded by a version column.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createConflictError,
  createUpstreamUnavailableError,
  type LearnerStateError,
} from '../../core/errors.js';
import { validateLearnerState } from '../../core/schemas.js';

import type { LearnerStateRepository, StoredLearnerState } from '../../core/ports.js';
import type { LearnerState } from '../../core/types.js';
import type { LearnerDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the repository.
 */
export interface LearnerStateRepoOptions {
  db: LearnerDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyLearnerStateRepo implements LearnerStateRepository {
  private readonly db: LearnerDbClient;
  private readonly log: Logger;

  constructor(options: LearnerStateRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'learner-state-repo' });
  }

  async load(userId: string): Promise<Result<StoredLearnerState | null, LearnerStateError>> {
    let row: { state: unknown; version: number } | undefined;
    try {
      row = await this.db
        .selectFrom('learner_states')
        .select(['state', 'version'])
        .where('user_id', '=', userId)
        .executeTakeFirst();
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to load learner state');
      return err(
        createUpstreamUnavailableError('persistence', 'Failed to load learner state', error)
      );
    }

    if (row === undefined) {
      return ok(null);
    }

    const validation = validateLearnerState(row.state);
    if (validation.isErr()) {
      this.log.error(
        { userId, details: validation.error.details },
        'Stored learner state is malformed'
      );
      return err(validation.error);
    }

    return ok({ state: validation.value, version: row.version });
  }

  async store(
    userId: string,
    state: LearnerState,
    expectedVersion: number | null
  ): Promise<Result<number, LearnerStateError>> {
    try {
      const row =
        expectedVersion === null
          ? await this.insertState(userId, state)
          : await this.updateState(userId, state, expectedVersion);

      if (row === undefined) {
        this.log.debug({ userId, expectedVersion }, 'Learner state version mismatch');
        return err(createConflictError(userId, 0));
      }

      return ok(row.version);
    } catch (error) {
      this.log.error({ err: error, userId, expectedVersion }, 'Failed to store learner state');
      return err(
        createUpstreamUnavailableError('persistence', 'Failed to store learner state', error)
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Inserts the first version. A row written in the meantime by another
   * writer makes this a no-op, which the caller reports as a conflict.
   */
  private async insertState(
    userId: string,
    state: LearnerState
  ): Promise<{ version: number } | undefined> {
    return this.db
      .insertInto('learner_states')
      .values({
        user_id: userId,
        state: JSON.stringify(state),
        version: 1,
      })
      .onConflict((oc) => oc.column('user_id').doNothing())
      .returning('version')
      .executeTakeFirst();
  }

  /**
   * Compare-and-swap on the version column.
   */
  private async updateState(
    userId: string,
    state: LearnerState,
    expectedVersion: number
  ): Promise<{ version: number } | undefined> {
    return this.db
      .updateTable('learner_states')
      .set((eb) => ({
        state: JSON.stringify(state),
        version: eb('version', '+', 1),
        updated_at: new Date(),
      }))
      .where('user_id', '=', userId)
      .where('version', '=', expectedVersion)
      .returning('version')
      .executeTakeFirst();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a learner state repository.
 */
export const makeLearnerStateRepo = (options: LearnerStateRepoOptions): LearnerStateRepository => {
  return new KyselyLearnerStateRepo(options);
};
