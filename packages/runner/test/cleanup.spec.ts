import { createErrorHandler, type LockHandle, Session, type TransactionHandle } from '@cache-chain/core';
import { describe, expect, it, vi } from 'vitest';
import { releaseSessionResources } from '../src/index.js';

const transactionClosing = (close: () => void, closed = false): TransactionHandle => ({
  state: closed ? 'ROLLED_BACK' : 'ACTIVE',
  closed,
  commit: vi.fn(),
  rollback: vi.fn(),
  close,
});

describe('releaseSessionResources', () => {
  it('should close the transaction and release every lock', () => {
    const close = vi.fn();
    const release = vi.fn();
    const session = Session.create()
      .withTransaction(transactionClosing(close))
      .withLock('ledger/1', { release })
      .withLock('ledger/2', { release });

    const released = releaseSessionResources(session, createErrorHandler('throw'));

    expect(close).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledTimes(2);
    expect(released.transaction).toBeUndefined();
    expect(released.locks.size).toBe(0);
  });

  it('should not close a transaction that is already closed', () => {
    const close = vi.fn();

    const released = releaseSessionResources(
      Session.create().withTransaction(transactionClosing(close, true)),
      createErrorHandler('throw'),
    );

    expect(close).not.toHaveBeenCalled();
    expect(released.transaction).toBeUndefined();
  });

  it('should release locks after the transaction failed to close under the throw strategy', () => {
    const release = vi.fn();
    const lockHandle: LockHandle = { release };
    const session = Session.create()
      .withTransaction(
        transactionClosing(() => {
          throw new Error('close refused');
        }),
      )
      .withLock('ledger/1', lockHandle);

    expect(() => releaseSessionResources(session, createErrorHandler('throw'))).toThrow('close refused');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should raise every cleanup failure together', () => {
    const session = Session.create()
      .withTransaction(
        transactionClosing(() => {
          throw new Error('close refused');
        }),
      )
      .withLock('ledger/1', {
        release: () => {
          throw new Error('lock already released');
        },
      });

    let raised: unknown;
    try {
      releaseSessionResources(session, createErrorHandler('throw'));
    } catch (error) {
      raised = error;
    }

    expect(raised).toBeInstanceOf(AggregateError);
    expect(raised instanceof AggregateError && raised.message).toBe(`cleanup of session ${session.id} failed`);
    expect(raised instanceof AggregateError && raised.errors).toEqual([
      new Error('close refused'),
      new Error('lock already released'),
    ]);
  });

  it('should report failures to the handler and still return a released session', () => {
    const errorHandler = vi.fn();
    const session = Session.create()
      .withTransaction(
        transactionClosing(() => {
          throw new Error('close refused');
        }),
      )
      .withLock('ledger/1', { release: vi.fn() });

    const released = releaseSessionResources(session, errorHandler);

    expect(errorHandler).toHaveBeenCalledWith(
      new Error('close refused'),
      `transaction cleanup of session ${session.id}`,
    );
    expect([released.transaction, released.locks.size]).toEqual([undefined, 0]);
  });
});
