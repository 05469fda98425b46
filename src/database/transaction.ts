import type Database from 'better-sqlite3';
import { debug } from '../utils/logger';

export interface ScopeOptions {
  /** Aborting rolls back the scope at the next statement or before commit. */
  signal?: AbortSignal;
}

/**
 * Handle bound to one unit of work. Repositories run every statement
 * through it so the signal is honoured and nothing runs once the scope
 * has ended.
 */
export class DbSession {
  private active = true;

  constructor(private readonly signal?: AbortSignal) {}

  run<P extends unknown[]>(statement: Database.Statement<P>, ...params: P): Database.RunResult {
    this.ensureUsable();
    return statement.run(...params);
  }

  all<P extends unknown[], R>(statement: Database.Statement<P, R>, ...params: P): R[] {
    this.ensureUsable();
    return statement.all(...params);
  }

  end(): void {
    this.active = false;
  }

  private ensureUsable(): void {
    if (!this.active) {
      throw new Error('Database session used after its scope ended');
    }
    this.signal?.throwIfAborted();
  }
}

/** Runs `work` outside a transaction. For single-statement reads. */
export function withDbSession<T>(work: (session: DbSession) => T, options: ScopeOptions = {}): T {
  options.signal?.throwIfAborted();
  const session = new DbSession(options.signal);
  try {
    return work(session);
  } finally {
    session.end();
  }
}

/**
 * Runs `work` in a `BEGIN IMMEDIATE` transaction: commits when it returns,
 * rolls back when it throws. `work` must be synchronous.
 */
export function withTransaction<T>(
  db: Database.Database,
  work: (session: DbSession) => T,
  options: ScopeOptions = {}
): T {
  const { signal } = options;
  signal?.throwIfAborted();

  const session = new DbSession(signal);
  const transaction = db.transaction(() => {
    const result = work(session);
    signal?.throwIfAborted();
    return result;
  });

  try {
    return transaction.immediate();
  } catch (error) {
    debug('transaction', 'Rolled back', {
      reason: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    session.end();
  }
}
