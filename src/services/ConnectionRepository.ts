import type Database from 'better-sqlite3';
import type { DbSession } from '../database/transaction';
import { LibraryPanelDashboardNotFoundError, isUniqueConstraintViolation } from '../errors';
import type { LibraryPanel, LibraryPanelConnection, SignedInUser } from '../models/types';
import { debug } from '../utils/logger';

export class ConnectionRepository {
  private readonly statements: {
    insert: Database.Statement<[number, number, string, number]>;
    deleteByPanelAndDashboard: Database.Statement<[number, number]>;
    selectByPanel: Database.Statement<[number], LibraryPanelConnection>;
  };

  constructor(db: Database.Database) {
    this.statements = {
      insert: db.prepare<[number, number, string, number]>(`
        INSERT INTO library_panel_dashboard (librarypanel_id, dashboard_id, created, created_by)
        VALUES (?, ?, ?, ?)
      `),
      deleteByPanelAndDashboard: db.prepare<[number, number]>(`
        DELETE FROM library_panel_dashboard WHERE librarypanel_id = ? AND dashboard_id = ?
      `),
      selectByPanel: db.prepare<[number], LibraryPanelConnection>(`
        SELECT * FROM library_panel_dashboard WHERE librarypanel_id = ?
      `),
    };
  }

  /** Idempotent: connecting an already connected pair succeeds without a second row. */
  connect(
    session: DbSession,
    panel: LibraryPanel,
    dashboardId: number,
    user: SignedInUser,
    now: Date
  ): void {
    debug('ConnectionRepository', 'Connecting dashboard', {
      panelId: panel.id,
      uid: panel.uid,
      dashboardId,
    });

    try {
      session.run(this.statements.insert, panel.id, dashboardId, now.toISOString(), user.user_id);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        debug('ConnectionRepository', 'Dashboard already connected', {
          panelId: panel.id,
          dashboardId,
        });
        return;
      }
      throw error;
    }
  }

  disconnect(session: DbSession, panel: LibraryPanel, dashboardId: number): void {
    debug('ConnectionRepository', 'Disconnecting dashboard', {
      panelId: panel.id,
      uid: panel.uid,
      dashboardId,
    });

    const { changes } = session.run(
      this.statements.deleteByPanelAndDashboard,
      panel.id,
      dashboardId
    );
    if (changes !== 1) {
      throw new LibraryPanelDashboardNotFoundError();
    }
  }

  listConnections(session: DbSession, panel: LibraryPanel): LibraryPanelConnection[] {
    return session.all(this.statements.selectByPanel, panel.id);
  }

  /** Connected dashboard ids. A set: callers must not rely on the order. */
  listForPanel(session: DbSession, panel: LibraryPanel): number[] {
    return this.listConnections(session, panel).map((connection) => connection.dashboard_id);
  }
}
