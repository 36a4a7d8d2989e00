import { setTimeout as delay } from 'node:timers/promises';
import { describe, expect, it } from 'vitest';
import {
  type Action,
  ChainInterruptedError,
  type ChainOutcome,
  chain,
  commit,
  entries,
  fromSession,
  get,
  group,
  type OutcomeReporter,
  put,
  remove,
  runChain,
  success,
  tx,
  txBegin,
} from '../../src/index.js';
import { createRecordingReporter, createTestContext, createTestSession } from '../../src/testing/index.js';
import { createStubClient, type StubClientOptions } from '../helpers/stub-client.js';

const setup = (options: StubClientOptions = {}) => {
  const client = createStubClient(options);
  const recording = createRecordingReporter();
  const ctx = createTestContext({ reporter: recording.reporter });
  return { client, recording, ctx, session: createTestSession(client) };
};

/** Reporter that takes the first `accepted` outcomes and throws on every later one */
const failingAfter = (accepted: number): OutcomeReporter => {
  let seen = 0;
  return {
    record: () => {
      seen += 1;
      if (seen > accepted) {
        throw new Error('sink down');
      }
    },
  };
};

const raisedBy = (pending: Promise<ChainOutcome>): Promise<unknown> =>
  pending.then(
    () => undefined,
    (error: unknown) => error,
  );

const reasonsOf = (outcome: ChainOutcome): string[] =>
  outcome.status === 'failed' ? outcome.failures.flatMap((failed) => failed.reasons.map((reason) => reason.message)) : [];

describe('chain', () => {
  it('should splice lists of elements in place', () => {
    const elements = chain(put<number, number>('C', 1, 2), [get<number, number>('C', 1), remove<number>('C', 1)]);

    expect(elements.map((element) => (element.kind === 'action' ? element.request : element.kind))).toEqual([
      'put C',
      'get C',
      'remove C',
    ]);
  });
});

describe('runChain', () => {
  it('should thread the session from action to action', async () => {
    const { ctx, session } = setup();

    const outcome = await runChain(
      chain(
        put<number, number>('C', 1, 100),
        get<number, number>('C', 1).check(
          entries<number, number>()
            .transform((found) => found.value)
            .saveAs('saved'),
        ),
      ),
      session,
      ctx,
    );

    expect(outcome.status).toBe('completed');
    expect(outcome.session.get('saved')).toBe(100);
  });

  it('should halt at the first failure', async () => {
    const { client, recording, ctx, session } = setup();

    const outcome = await runChain(
      chain(get<number, number>('C', 1).check(entries<number, number>().count.is(1)), put<number, number>('C', 1, 2)),
      session,
      ctx,
    );

    expect(outcome.status).toBe('failed');
    expect(reasonsOf(outcome)).toEqual(['entries.count.is(1): found 0']);
    expect(client.journal).toEqual(['get C']);
    expect(recording.summary()).toEqual(['get C:KO']);
  });

  it('should report outcomes under their group path', async () => {
    const { recording, ctx, session } = setup();

    await runChain(
      chain(group('outer', put<number, number>('C', 1, 2), group('inner', get<number, number>('C', 1)))),
      session,
      ctx,
    );

    expect(recording.outcomes.map((outcome) => outcome.groups)).toEqual([['outer'], ['outer', 'inner']]);
  });

  describe('transaction scope', () => {
    it('should begin, run the body and close', async () => {
      const { client, recording, ctx, session } = setup();

      const outcome = await runChain(chain(tx().run(put<number, number>('C', 1, 2))), session, ctx);

      expect(outcome.status).toBe('completed');
      expect(outcome.session.transaction).toBeUndefined();
      expect(client.journal).toEqual(['beginTransaction', 'put C tx1', 'close tx1']);
      expect(client.transactions[0]?.state).toBe('ROLLED_BACK');
      expect(recording.summary()).toEqual(['txBegin:OK', 'put C:OK', 'txClose:OK']);
    });

    it('should pass options to the transaction', async () => {
      const { client, ctx, session } = setup();

      await runChain(
        chain(tx().concurrency('OPTIMISTIC').isolation('SERIALIZABLE').timeout(500).run(commit())),
        session,
        ctx,
      );

      expect(client.transactions[0]?.options).toEqual({
        concurrency: 'OPTIMISTIC',
        isolation: 'SERIALIZABLE',
        timeout: 500,
      });
      expect(client.transactions[0]?.state).toBe('COMMITTED');
    });

    it('should close after a failing body and return the body failure', async () => {
      const { client, ctx, session } = setup();

      const outcome = await runChain(
        chain(
          tx().run(get<number, number>('C', 1).check(entries<number, number>().count.is(1)), commit()),
          put<number, number>('C', 5, 5),
        ),
        session,
        ctx,
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.session.transaction).toBeUndefined();
      expect(reasonsOf(outcome)).toEqual(['entries.count.is(1): found 0']);
      expect(client.journal).toEqual(['beginTransaction', 'get C tx1', 'close tx1']);
    });

    it('should aggregate body and close failures', async () => {
      const { ctx, session } = setup({
        failures: { put: new Error('write failed'), close: new Error('close failed') },
      });

      const outcome = await runChain(chain(tx().run(put<number, number>('C', 1, 2))), session, ctx);

      expect(reasonsOf(outcome)).toEqual(['write failed', 'close failed']);
      expect(outcome.session.transaction).toBeUndefined();
    });

    it('should close the transaction when the reporter throws inside the body', async () => {
      const { client, ctx, session } = setup();

      const raised = await raisedBy(
        runChain(chain(tx().run(put<number, number>('C', 1, 2), commit())), session, {
          ...ctx,
          reporter: failingAfter(1),
        }),
      );

      expect(raised).toBeInstanceOf(ChainInterruptedError);
      expect(raised instanceof ChainInterruptedError && raised.cause).toEqual(new Error('sink down'));
      expect(raised instanceof ChainInterruptedError && raised.session.transaction).toBeUndefined();
      expect(client.journal).toEqual(['beginTransaction', 'put C tx1', 'close tx1']);
      expect(client.transactions[0]?.closed).toBe(true);
    });

    it('should raise the reporter error together with a failed close', async () => {
      const { client, ctx, session } = setup({ failures: { close: new Error('close refused') } });

      const raised = await raisedBy(
        runChain(chain(tx().run(put<number, number>('C', 1, 2))), session, { ...ctx, reporter: failingAfter(1) }),
      );

      const cause = raised instanceof ChainInterruptedError ? raised.cause : undefined;
      expect(cause).toBeInstanceOf(AggregateError);
      expect(cause instanceof AggregateError && cause.errors).toEqual([new Error('sink down'), new Error('close refused')]);
      expect(client.journal).toEqual(['beginTransaction', 'put C tx1', 'close tx1']);
    });

    it('should report the scope under its name', async () => {
      const { recording, ctx, session } = setup();

      await runChain(chain(tx().run(commit()).as('transfer')), session, ctx);

      expect(recording.outcomes.map((outcome) => [outcome.request, outcome.groups])).toEqual([
        ['txBegin', ['transfer']],
        ['txCommit', ['transfer']],
        ['txClose', ['transfer']],
      ]);
    });

    it('should fail a nested scope under the fail policy and still close the outer one', async () => {
      const { client, ctx, session } = setup();

      const outcome = await runChain(chain(tx().run(tx().run(commit()))), session, ctx);

      expect(reasonsOf(outcome)).toEqual(['a transaction is already active']);
      expect(client.journal).toEqual(['beginTransaction', 'close tx1']);
      expect(outcome.session.transaction).toBeUndefined();
    });

    it('should leave closing to the outer scope under the reuse policy', async () => {
      const { client, recording, session } = setup();
      const ctx = createTestContext({ reporter: recording.reporter, nestedTransactions: 'reuse' });

      const outcome = await runChain(
        chain(tx().run(tx().run(put<number, number>('C', 1, 2)), put<number, number>('C', 2, 3), commit())),
        session,
        ctx,
      );

      expect(outcome.status).toBe('completed');
      expect(client.journal).toEqual(['beginTransaction', 'put C tx1', 'put C tx1', 'commit tx1', 'close tx1']);
    });
  });

  describe('abort', () => {
    it('should not start any action once aborted', async () => {
      const { client, recording, ctx, session } = setup();
      const controller = new AbortController();
      controller.abort();

      const outcome = await runChain(chain(put<number, number>('C', 1, 2)), session, { ...ctx, signal: controller.signal });

      expect(outcome.status === 'failed' && outcome.failures[0]?.reasons).toEqual([
        { kind: 'aborted', message: 'chain aborted' },
      ]);
      expect(client.journal).toEqual([]);
      expect(recording.outcomes).toEqual([]);
    });

    it('should still close a scoped transaction when aborted inside it', async () => {
      const { client, ctx, session } = setup();
      const controller = new AbortController();
      const abortingKey = fromSession(() => {
        controller.abort();
        return success(1);
      });

      const outcome = await runChain(
        chain(tx().run(put<number, number>('C', abortingKey, 1), put<number, number>('C', 2, 2))),
        session,
        { ...ctx, signal: controller.signal },
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.session.transaction).toBeUndefined();
      expect(client.journal).toEqual(['beginTransaction', 'put C tx1', 'close tx1']);
    });
  });

  describe('request timeout', () => {
    const slowAction = (lateReport: boolean): Action => ({
      kind: 'action',
      actionType: 'get',
      request: 'get C',
      resource: 'C',
      execute: async (session, ctx) => {
        await delay(40);
        if (lateReport) {
          ctx.reporter.record({
            request: 'get C',
            groups: ctx.groups,
            sessionId: session.id,
            userId: session.userId,
            start: 0,
            end: 0,
            status: 'OK',
          });
        }
        return { status: 'continue', session };
      },
    });

    it('should fail an action that outlives the timeout and drop its late report', async () => {
      const { recording, ctx, session } = setup();

      const outcome = await runChain(chain(slowAction(true)), session, { ...ctx, requestTimeout: 5 });
      await delay(60);

      expect(outcome.status === 'failed' && outcome.failures[0]?.reasons).toEqual([
        { kind: 'timeout', message: 'no result within 5 ms' },
      ]);
      expect(recording.outcomes.map((recorded) => recorded.message)).toEqual(['get C: no result within 5 ms']);
    });

    it('should raise a reporter error on the timeout from the chain', async () => {
      const { ctx, session } = setup();

      const raised = await raisedBy(
        runChain(chain(slowAction(false)), session, { ...ctx, requestTimeout: 5, reporter: failingAfter(0) }),
      );
      await delay(60);

      expect(raised).toBeInstanceOf(ChainInterruptedError);
      expect(raised instanceof ChainInterruptedError && raised.message).toBe('sink down');
      expect(raised instanceof ChainInterruptedError && raised.session).toBe(session);
    });

    it('should let actions finishing in time through', async () => {
      const { recording, ctx, session } = setup();

      const outcome = await runChain(chain(put<number, number>('C', 1, 2)), session, { ...ctx, requestTimeout: 1_000 });

      expect(outcome.status).toBe('completed');
      expect(recording.summary()).toEqual(['put C:OK']);
    });

    it('should close a scoped transaction after a body timeout', async () => {
      const { client, ctx, session } = setup();

      const outcome = await runChain(chain(tx().run(slowAction(false))), session, { ...ctx, requestTimeout: 5 });

      expect(outcome.status).toBe('failed');
      expect(outcome.session.transaction).toBeUndefined();
      expect(client.journal).toEqual(['beginTransaction', 'close tx1']);
    });
  });

  describe('interruption', () => {
    it('should carry the session the action left when the reporter throws', async () => {
      const { client, ctx, session } = setup();

      const raised = await raisedBy(
        runChain(chain(txBegin(), put<number, number>('C', 1, 2)), session, { ...ctx, reporter: failingAfter(1) }),
      );

      expect(raised instanceof ChainInterruptedError && raised.session.transaction).toBe(client.transactions[0]);
      expect(client.journal).toEqual(['beginTransaction', 'put C tx1']);
    });

    it('should wrap an error thrown by an action with the session before it', async () => {
      const { ctx, session } = setup();
      const broken: Action = {
        kind: 'action',
        actionType: 'get',
        request: 'get C',
        resource: 'C',
        execute: () => Promise.reject(new Error('view gone')),
      };

      const raised = await raisedBy(runChain(chain(put<number, number>('C', 1, 2), broken), session, ctx));

      expect(raised).toBeInstanceOf(ChainInterruptedError);
      expect(raised instanceof ChainInterruptedError && raised.message).toBe('view gone');
      expect(raised instanceof ChainInterruptedError && raised.session.id).toBe(session.id);
    });
  });
});
