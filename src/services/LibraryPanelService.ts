import type Database from 'better-sqlite3';
import { withDbSession, withTransaction } from '../database/transaction';
import type {
  CreateLibraryPanelCommand,
  LibraryPanel,
  PatchLibraryPanelCommand,
  RequestContext,
} from '../models/types';
import { debug } from '../utils/logger';
import type { UidGenerator } from '../utils/uid';
import { ConnectionRepository } from './ConnectionRepository';
import { PanelRepository } from './PanelRepository';

export interface LibraryPanelServiceOptions {
  generateUid?: UidGenerator;
  now?: () => Date;
}

/**
 * Library panel operations for one caller. Every call takes the caller's
 * context explicitly; anything that reads and then writes runs in a single
 * transaction.
 */
export class LibraryPanelService {
  private readonly panels: PanelRepository;
  private readonly connections: ConnectionRepository;
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: LibraryPanelServiceOptions = {}
  ) {
    this.panels = new PanelRepository(db, options.generateUid);
    this.connections = new ConnectionRepository(db);
    this.now = options.now ?? (() => new Date());
  }

  createLibraryPanel(ctx: RequestContext, cmd: CreateLibraryPanelCommand): LibraryPanel {
    const panel = withTransaction(
      this.db,
      (session) => this.panels.create(session, ctx.user, cmd, this.now()),
      ctx
    );
    debug('LibraryPanelService', 'Created library panel', { uid: panel.uid, id: panel.id });
    return panel;
  }

  getLibraryPanel(ctx: RequestContext, uid: string): LibraryPanel {
    return withDbSession((session) => this.panels.get(session, uid, ctx.user.org_id), ctx);
  }

  getAllLibraryPanels(ctx: RequestContext): LibraryPanel[] {
    return withDbSession((session) => this.panels.listAll(session, ctx.user.org_id), ctx);
  }

  patchLibraryPanel(ctx: RequestContext, uid: string, cmd: PatchLibraryPanelCommand): LibraryPanel {
    return withTransaction(
      this.db,
      (session) => this.panels.patch(session, ctx.user, uid, cmd, this.now()),
      ctx
    );
  }

  deleteLibraryPanel(ctx: RequestContext, uid: string): void {
    withTransaction(this.db, (session) => this.panels.delete(session, uid, ctx.user.org_id), ctx);
  }

  connectDashboard(ctx: RequestContext, uid: string, dashboardId: number): void {
    withTransaction(
      this.db,
      (session) => {
        const panel = this.panels.get(session, uid, ctx.user.org_id);
        this.connections.connect(session, panel, dashboardId, ctx.user, this.now());
      },
      ctx
    );
  }

  disconnectDashboard(ctx: RequestContext, uid: string, dashboardId: number): void {
    withTransaction(
      this.db,
      (session) => {
        const panel = this.panels.get(session, uid, ctx.user.org_id);
        this.connections.disconnect(session, panel, dashboardId);
      },
      ctx
    );
  }

  getConnectedDashboards(ctx: RequestContext, uid: string): number[] {
    return withTransaction(
      this.db,
      (session) => {
        const panel = this.panels.get(session, uid, ctx.user.org_id);
        return this.connections.listForPanel(session, panel);
      },
      ctx
    );
  }
}
