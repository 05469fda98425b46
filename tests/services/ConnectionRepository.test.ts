import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { openDatabase } from '../../src/database/connection';
import { type DbSession, withTransaction } from '../../src/database/transaction';
import { LibraryPanelDashboardNotFoundError } from '../../src/errors';
import type { LibraryPanel, SignedInUser } from '../../src/models/types';
import { ConnectionRepository } from '../../src/services/ConnectionRepository';
import { PanelRepository } from '../../src/services/PanelRepository';

const user: SignedInUser = { user_id: 42, org_id: 1 };
const now = new Date('2024-05-01T10:00:00.000Z');

describe('ConnectionRepository', () => {
  let db: Database.Database;
  let connections: ConnectionRepository;
  let panel: LibraryPanel;
  let sibling: LibraryPanel;

  const tx = <T>(work: (session: DbSession) => T): T => withTransaction(db, work);

  beforeEach(() => {
    db = openDatabase(':memory:');
    let next = 0;
    const panels = new PanelRepository(db, () => `panel-${++next}`);
    connections = new ConnectionRepository(db);
    panel = tx((s) => panels.create(s, user, { folder_id: 0, name: 'CPU', model: {} }, now));
    sibling = tx((s) => panels.create(s, user, { folder_id: 0, name: 'Disk', model: {} }, now));
  });

  afterEach(() => {
    db.close();
  });

  test('should store one connection when connecting twice', () => {
    tx((s) => connections.connect(s, panel, 100, user, now));
    expect(() => tx((s) => connections.connect(s, panel, 100, user, now))).not.toThrow();

    expect(tx((s) => connections.listConnections(s, panel))).toEqual([
      {
        id: 1,
        librarypanel_id: panel.id,
        dashboard_id: 100,
        created: '2024-05-01T10:00:00.000Z',
        created_by: 42,
      },
    ]);
  });

  test('should fail with ConnectionNotFound for a pair that was never connected', () => {
    expect(() => tx((s) => connections.disconnect(s, panel, 100))).toThrow(
      LibraryPanelDashboardNotFoundError
    );
  });

  test('should remove only the addressed connection', () => {
    tx((s) => connections.connect(s, panel, 100, user, now));
    tx((s) => connections.connect(s, panel, 200, user, now));
    tx((s) => connections.connect(s, sibling, 100, user, now));

    tx((s) => connections.disconnect(s, panel, 100));

    expect(tx((s) => connections.listForPanel(s, panel))).toEqual([200]);
    expect(tx((s) => connections.listForPanel(s, sibling))).toEqual([100]);
    expect(() => tx((s) => connections.disconnect(s, panel, 100))).toThrow(
      'library panel dashboard could not be found'
    );
  });

  test('should list the dashboards connected to one panel', () => {
    tx((s) => connections.connect(s, panel, 9, user, now));
    tx((s) => connections.connect(s, panel, 7, user, now));
    tx((s) => connections.connect(s, sibling, 3, user, now));

    const dashboards = tx((s) => connections.listForPanel(s, panel));
    expect(new Set(dashboards)).toEqual(new Set([7, 9]));
    expect(dashboards).toHaveLength(2);
  });

  test('should return an empty list for an unconnected panel', () => {
    expect(tx((s) => connections.listForPanel(s, panel))).toEqual([]);
  });
});
