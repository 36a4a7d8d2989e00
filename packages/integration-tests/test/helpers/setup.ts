import type { ActionContext, ChainOutcome, Session } from '@cache-chain/core';
import {
  createRecordingReporter,
  createTestContext,
  createTestSession,
  type RecordingReporter,
} from '@cache-chain/core/testing';
import { createMemoryGrid, type MemoryGrid, type MemoryGridOptions } from '@cache-chain/memory-grid';

export interface GridTestContext {
  grid: MemoryGrid;
  recording: RecordingReporter;
  ctx: ActionContext;
  /** Fresh session bound to the grid */
  newSession: (attributes?: Record<string, unknown>) => Session;
}

export const setupGrid = (
  options: MemoryGridOptions = {},
  contextOverrides: Partial<ActionContext> = {},
): GridTestContext => {
  const grid = createMemoryGrid(options);
  const recording = createRecordingReporter();
  return {
    grid,
    recording,
    ctx: createTestContext({ reporter: recording.reporter, ...contextOverrides }),
    newSession: (attributes = {}) => createTestSession(grid, attributes),
  };
};

export const failureMessages = (outcome: ChainOutcome): string[] =>
  outcome.status === 'failed' ? outcome.failures.flatMap((failed) => failed.reasons.map((reason) => reason.message)) : [];

export const TRANSACTIONAL_LEDGER: MemoryGridOptions = { caches: { ledger: { atomicity: 'TRANSACTIONAL' } } };
