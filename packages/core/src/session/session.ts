/**
 * Session Store
 *
 * Per-user state threaded through an action chain. Every mutator returns a new
 * `Session`; the receiver never changes, so a session handed to an action is still
 * valid for whoever kept a reference to it.
 *
 * Reserved slots (client, transaction, explicit-lock flag, held locks) have typed
 * accessors; everything else is a user-named attribute written by checks or feeders.
 *
 * @module session
 */

import { generateSessionId, type SessionId } from '../domain/branded-types.js';
import type { ClientHandle, LockHandle, TransactionHandle } from '../interfaces/index.js';

interface SessionState {
  readonly id: SessionId;
  readonly userId: number;
  readonly scenario: string;
  readonly client: ClientHandle | undefined;
  readonly transaction: TransactionHandle | undefined;
  readonly explicitLocksUsed: true | undefined;
  readonly locks: ReadonlyMap<string, LockHandle>;
  readonly attributes: ReadonlyMap<string, unknown>;
}

/** Options for {@link Session.create} */
export interface CreateSessionOptions {
  id?: SessionId;
  userId?: number;
  scenario?: string;
  client?: ClientHandle;
  attributes?: Readonly<Record<string, unknown>>;
}

export class Session {
  private constructor(private readonly state: SessionState) {}

  /**
   * Creates a session
   *
   * @example
   * ```typescript
   * const session = Session.create({ userId: 1, scenario: 'Basic', client, attributes: { key: 1 } });
   * ```
   */
  static create(options: CreateSessionOptions = {}): Session {
    return new Session({
      id: options.id ?? generateSessionId(),
      userId: options.userId ?? 1,
      scenario: options.scenario ?? 'default',
      client: options.client,
      transaction: undefined,
      explicitLocksUsed: undefined,
      locks: new Map(),
      attributes: new Map(Object.entries(options.attributes ?? {})),
    });
  }

  get id(): SessionId {
    return this.state.id;
  }

  get userId(): number {
    return this.state.userId;
  }

  get scenario(): string {
    return this.state.scenario;
  }

  get client(): ClientHandle | undefined {
    return this.state.client;
  }

  get transaction(): TransactionHandle | undefined {
    return this.state.transaction;
  }

  /** Unset until an explicit lock was taken in this session, then `true` */
  get explicitLocksUsed(): true | undefined {
    return this.state.explicitLocksUsed;
  }

  get locks(): ReadonlyMap<string, LockHandle> {
    return this.state.locks;
  }

  get attributeNames(): string[] {
    return [...this.state.attributes.keys()];
  }

  withClient(client: ClientHandle): Session {
    return this.copy({ client });
  }

  withTransaction(transaction: TransactionHandle): Session {
    return this.copy({ transaction });
  }

  withoutTransaction(): Session {
    return this.state.transaction ? this.copy({ transaction: undefined }) : this;
  }

  withExplicitLocksUsed(): Session {
    return this.state.explicitLocksUsed ? this : this.copy({ explicitLocksUsed: true });
  }

  withLock(lockId: string, lock: LockHandle): Session {
    const locks = new Map(this.state.locks);
    locks.set(lockId, lock);
    return this.copy({ locks });
  }

  withoutLock(lockId: string): Session {
    if (!this.state.locks.has(lockId)) {
      return this;
    }
    const locks = new Map(this.state.locks);
    locks.delete(lockId);
    return this.copy({ locks });
  }

  has(name: string): boolean {
    return this.state.attributes.has(name);
  }

  /** Raw attribute value; use a `SessionKey` for a typed read */
  get(name: string): unknown {
    return this.state.attributes.get(name);
  }

  set(name: string, value: unknown): Session {
    const attributes = new Map(this.state.attributes);
    attributes.set(name, value);
    return this.copy({ attributes });
  }

  remove(name: string): Session {
    if (!this.state.attributes.has(name)) {
      return this;
    }
    const attributes = new Map(this.state.attributes);
    attributes.delete(name);
    return this.copy({ attributes });
  }

  private copy(changes: Partial<SessionState>): Session {
    return new Session({ ...this.state, ...changes });
  }
}
