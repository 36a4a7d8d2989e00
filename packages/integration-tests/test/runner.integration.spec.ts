/**
 * Integration Tests: Scenario Runs
 *
 * Concurrent users driven by the runner over one shared memory grid.
 */

import { commit, entries, get, getOrCreateCache, numberKey, put, tx, txBegin } from '@cache-chain/core';
import { createMemoryGrid } from '@cache-chain/memory-grid';
import { runScenario, scenario } from '@cache-chain/runner';
import { describe, expect, it } from 'vitest';
import { TRANSACTIONAL_LEDGER } from './helpers/setup.js';

describe('Scenario Run Integration', () => {
  it('should commit one transfer per user', async () => {
    const grid = createMemoryGrid();
    const transfers = scenario('transfers')
      .exec(getOrCreateCache('ledger').atomicity('TRANSACTIONAL'))
      .exec(tx().run(put<number, number>('ledger', numberKey('account'), 100), commit()));

    const report = await runScenario(transfers, {
      users: 4,
      client: grid,
      feeder: (userId) => ({ account: userId * 10 }),
    });

    expect(grid.cache<number, number>('ledger').keys().sort((a, b) => a - b)).toEqual([10, 20, 30, 40]);
    expect([report.okRequests, report.failedRequests, report.failedSessions]).toEqual([20, 0, 0]);
    expect(grid.configurationOf('ledger')?.atomicity).toBe('TRANSACTIONAL');
  });

  it('should roll back and unlock the work of sessions that stopped inside a transaction', async () => {
    const grid = createMemoryGrid({ caches: { ledger: { atomicity: 'TRANSACTIONAL' } } });
    const stopping = scenario('stopping').exec(
      txBegin(),
      put<number, number>('ledger', numberKey('account'), 1),
      get<number, number>('ledger', 999).check(entries<number, number>().count.is(1)),
    );

    const report = await runScenario(stopping, {
      users: 2,
      client: grid,
      feeder: [{ account: 1 }, { account: 2 }],
    });

    const ledger = grid.cache<number, number>('ledger');
    expect(report.failedSessions).toBe(2);
    expect(report.sessions.map((result) => result.session.transaction)).toEqual([undefined, undefined]);
    expect(ledger.size()).toBe(0);
    expect(() => ledger.lock(1).release()).not.toThrow();
    expect(() => ledger.lock(2).release()).not.toThrow();
  });

  it('should time out slow async operations', async () => {
    const grid = createMemoryGrid({ caches: { accounts: {} }, mode: 'async', asyncDelay: 50 });

    const report = await runScenario(scenario('slow').exec(get<number, number>('accounts', 1)), {
      client: grid,
      requestTimeout: 5,
    });

    const [result] = report.sessions;
    expect(result?.outcome.status === 'failed' && result.outcome.failures[0]?.reasons).toEqual([
      { kind: 'timeout', message: 'no result within 5 ms' },
    ]);
    expect(report.outcomes.map((outcome) => outcome.message)).toEqual(['get accounts: no result within 5 ms']);
  });

  it('should leave no key owned after a reporter error rejects the run', async () => {
    const grid = createMemoryGrid(TRANSACTIONAL_LEDGER);
    const transfer = scenario('transfer').exec(
      tx().run(put<number, number>('ledger', numberKey('account'), 100), commit()),
    );
    let recorded = 0;

    await expect(
      runScenario(transfer, {
        client: grid,
        feeder: [{ account: 1 }],
        errorHandler: 'throw',
        reporter: {
          record: () => {
            recorded += 1;
            if (recorded === 2) {
              throw new Error('sink down');
            }
          },
        },
      }),
    ).rejects.toThrow('sink down');

    const ledger = grid.cache<number, number>('ledger');
    expect(ledger.size()).toBe(0);

    const retried = await runScenario(transfer, { client: grid, feeder: [{ account: 1 }] });

    expect([retried.okRequests, retried.failedRequests]).toEqual([4, 0]);
    expect(ledger.get(1)).toEqual(new Map([[1, 100]]));
  });
});
