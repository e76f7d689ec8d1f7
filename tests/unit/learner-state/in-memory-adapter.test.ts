import { describe, it, expect } from 'vitest';

import {
  makeInMemoryLearnerStateRepo,
  makeInMemorySubmissionSource,
} from '@/modules/learner-state/shell/adapters/in-memory-adapter.js';

import { createTestLearnerState, createTestSubmission } from '../../fixtures/builders.js';

describe('makeInMemoryLearnerStateRepo', () => {
  it('stores the first version only when nothing is stored', async () => {
    const repo = makeInMemoryLearnerStateRepo();

    expect((await repo.store('user-1', createTestLearnerState(), null))._unsafeUnwrap()).toBe(1);
    expect((await repo.store('user-1', createTestLearnerState(), null)).isErr()).toBe(true);
  });

  it('rejects a stale version', async () => {
    const repo = makeInMemoryLearnerStateRepo({
      initialStates: new Map([['user-1', createTestLearnerState()]]),
    });

    expect((await repo.store('user-1', createTestLearnerState(), 1))._unsafeUnwrap()).toBe(2);
    expect((await repo.store('user-1', createTestLearnerState(), 1))._unsafeUnwrapErr()).toMatchObject({
      type: 'ConflictError',
      userId: 'user-1',
    });
  });

  it('hands out copies, not the stored document', async () => {
    const repo = makeInMemoryLearnerStateRepo({
      initialStates: new Map([['user-1', createTestLearnerState({ streak: 1 })]]),
    });

    const loaded = (await repo.load('user-1'))._unsafeUnwrap();
    if (loaded !== null) {
      loaded.state.streak = 50;
    }

    expect(repo.peek('user-1')?.state.streak).toBe(1);
  });
});

describe('makeInMemorySubmissionSource', () => {
  const source = makeInMemorySubmissionSource({
    submissions: new Map([
      [
        'user-1',
        [
          createTestSubmission({ submissionId: 's2', occurredAt: '2024-01-02T10:00:00.000Z' }),
          createTestSubmission({ submissionId: 's1', occurredAt: '2024-01-01T10:00:00.000Z' }),
          createTestSubmission({
            submissionId: 's3',
            questionId: 'q-2',
            success: false,
            occurredAt: '2024-01-03T10:00:00.000Z',
          }),
        ],
      ],
    ]),
  });

  it('lists submissions in replay order', async () => {
    const events = (await source.listSubmissions('user-1'))._unsafeUnwrap();

    expect(events.map((event) => event.submissionId)).toEqual(['s1', 's2', 's3']);
  });

  it('looks only at earlier successes on the same question', async () => {
    const check = async (overrides: Parameters<typeof createTestSubmission>[0]) =>
      (await source.hasPriorSuccess('user-1', createTestSubmission(overrides)))._unsafeUnwrap();

    expect(await check({ submissionId: 's1' })).toBe(false);
    expect(await check({ submissionId: 's2', occurredAt: '2024-01-02T10:00:00.000Z' })).toBe(true);
    expect(await check({ submissionId: 's4', questionId: 'q-2', occurredAt: '2024-02-01T10:00:00.000Z' })).toBe(
      false
    );
  });
});
