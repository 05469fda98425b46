import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { openDatabase } from '../../src/database/connection';
import { type DbSession, withDbSession, withTransaction } from '../../src/database/transaction';

describe('withTransaction', () => {
  let db: Database.Database;
  let insert: Database.Statement<[string]>;

  const count = () =>
    db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM items').get()?.count;

  beforeEach(() => {
    db = openDatabase(':memory:');
    db.exec('CREATE TABLE items (id INTEGER PRIMARY KEY, label TEXT NOT NULL UNIQUE)');
    insert = db.prepare<[string]>('INSERT INTO items (label) VALUES (?)');
  });

  afterEach(() => {
    db.close();
  });

  test('should commit when the work returns', () => {
    const changes = withTransaction(db, (session) => {
      session.run(insert, 'a');
      return session.run(insert, 'b').changes;
    });

    expect(changes).toBe(1);
    expect(count()).toBe(2);
  });

  test('should roll back every write when the work throws', () => {
    expect(() =>
      withTransaction(db, (session) => {
        session.run(insert, 'a');
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(count()).toBe(0);
  });

  test('should roll back when a statement fails', () => {
    expect(() =>
      withTransaction(db, (session) => {
        session.run(insert, 'a');
        session.run(insert, 'a');
      })
    ).toThrow(/UNIQUE constraint failed/);

    expect(count()).toBe(0);
  });

  test('should not start on an aborted signal', () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    const work = vi.fn();

    expect(() => withTransaction(db, work, { signal: controller.signal })).toThrow('cancelled');
    expect(work).not.toHaveBeenCalled();
  });

  test('should roll back when aborted between statements', () => {
    const controller = new AbortController();

    expect(() =>
      withTransaction(
        db,
        (session) => {
          session.run(insert, 'a');
          controller.abort(new Error('cancelled'));
          session.run(insert, 'b');
        },
        { signal: controller.signal }
      )
    ).toThrow('cancelled');

    expect(count()).toBe(0);
  });

  test('should roll back when aborted after the last statement', () => {
    const controller = new AbortController();

    expect(() =>
      withTransaction(
        db,
        (session) => {
          session.run(insert, 'a');
          controller.abort(new Error('deadline exceeded'));
        },
        { signal: controller.signal }
      )
    ).toThrow('deadline exceeded');

    expect(count()).toBe(0);
  });

  test('should reject a session used after its scope ended', () => {
    const sessions: DbSession[] = [];
    withTransaction(db, (session) => {
      sessions.push(session);
    });

    expect(() => sessions[0].run(insert, 'late')).toThrow(
      'Database session used after its scope ended'
    );
    expect(count()).toBe(0);
  });
});

describe('withTransaction on a shared file', () => {
  let dir: string;
  let holder: Database.Database;
  let contender: Database.Database;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'library-panels-lock-'));
    const path = join(dir, 'panels.sqlite');
    holder = openDatabase(path);
    contender = openDatabase(path);
    contender.pragma('busy_timeout = 0');
  });

  afterEach(() => {
    holder.close();
    contender.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test('should take the write lock before running the work', () => {
    holder.exec('BEGIN IMMEDIATE');
    const work = vi.fn();

    let failure: unknown;
    try {
      withTransaction(contender, work);
    } catch (error) {
      failure = error;
    }
    holder.exec('ROLLBACK');

    expect(failure).toMatchObject({ code: 'SQLITE_BUSY' });
    expect(work).not.toHaveBeenCalled();
  });
});

describe('withDbSession', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(':memory:');
    db.exec("CREATE TABLE items (id INTEGER PRIMARY KEY, label TEXT); INSERT INTO items (label) VALUES ('x')");
  });

  afterEach(() => {
    db.close();
  });

  test('should run reads and return their result', () => {
    const select = db.prepare<[], { label: string }>('SELECT label FROM items');
    expect(withDbSession((session) => session.all(select))).toEqual([{ label: 'x' }]);
  });

  test('should honour an aborted signal', () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    expect(() => withDbSession(() => 1, { signal: controller.signal })).toThrow('cancelled');
  });
});
