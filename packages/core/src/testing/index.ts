import { createActionContext } from '../chain/context.js';
import type { ClientHandle } from '../interfaces/index.js';
import { Session } from '../session/session.js';
import type { ActionContext, OutcomeReporter, RequestOutcome } from '../types.js';

/**
 * Controller for a reporter that keeps every outcome in memory
 */
export interface RecordingReporter {
  /** The reporter to hand to a chain run */
  reporter: OutcomeReporter;
  /** Outcomes recorded so far, in order */
  outcomes: RequestOutcome[];
  /** Request names with their status, e.g. `get C:OK` */
  summary: () => string[];
  clear: () => void;
}

/**
 * Create a reporter that records outcomes for assertions
 *
 * @example
 * ```typescript
 * import { createRecordingReporter, createTestContext } from '@cache-chain/core/testing';
 *
 * const recording = createRecordingReporter();
 * await runChain(chain(get<number, number>('C', 1)), session, createTestContext({ reporter: recording.reporter }));
 * expect(recording.summary()).toEqual(['get C:OK']);
 * ```
 */
export const createRecordingReporter = (): RecordingReporter => {
  const outcomes: RequestOutcome[] = [];
  return {
    reporter: { record: (outcome) => outcomes.push(outcome) },
    outcomes,
    summary: () => outcomes.map((outcome) => `${outcome.request}:${outcome.status}`),
    clear: () => {
      outcomes.length = 0;
    },
  };
};

/**
 * Create a context with a counting clock, so timestamps are deterministic
 *
 * Outcomes are discarded unless a reporter is given.
 */
export const createTestContext = (overrides: Partial<ActionContext> = {}): ActionContext => {
  let ticks = 0;
  return {
    ...createActionContext({
      reporter: { record: () => undefined },
      clock: () => ticks++,
    }),
    ...overrides,
  };
};

/** Create a session, optionally already holding a client */
export const createTestSession = (client?: ClientHandle, attributes: Record<string, unknown> = {}): Session =>
  Session.create({ ...(client ? { client } : {}), attributes });
