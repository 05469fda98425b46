import type Database from 'better-sqlite3';
import type { DbSession } from '../database/transaction';
import {
  LibraryPanelExistsError,
  LibraryPanelInvariantError,
  LibraryPanelNotFoundError,
  isUniqueConstraintViolation,
} from '../errors';
import type {
  CreateLibraryPanelCommand,
  LibraryPanel,
  PanelModel,
  PatchLibraryPanelCommand,
  SignedInUser,
} from '../models/types';
import { debug, logger } from '../utils/logger';
import { generateShortUid, type UidGenerator } from '../utils/uid';

interface LibraryPanelRow {
  id: number;
  org_id: number;
  folder_id: number;
  uid: string;
  name: string;
  model: string;
  created: string;
  updated: string;
  created_by: number;
  updated_by: number;
}

type InsertParams = [number, number, string, string, string, string, number, string, number];
type UpdateParams = [number, string, string, string, number, number];

function isPanelModel(value: unknown): value is PanelModel {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLibraryPanel(row: LibraryPanelRow): LibraryPanel {
  const model: unknown = JSON.parse(row.model);
  if (!isPanelModel(model)) {
    throw new Error(`library panel ${row.uid} has a model that is not a JSON object`);
  }
  return { ...row, model };
}

export class PanelRepository {
  private readonly statements: {
    insert: Database.Statement<InsertParams>;
    selectByUid: Database.Statement<[string, number], LibraryPanelRow>;
    selectByOrg: Database.Statement<[number], LibraryPanelRow>;
    update: Database.Statement<UpdateParams>;
    deleteByUid: Database.Statement<[string, number]>;
  };

  constructor(
    db: Database.Database,
    private readonly generateUid: UidGenerator = generateShortUid
  ) {
    this.statements = {
      insert: db.prepare<InsertParams>(`
        INSERT INTO library_panel (
          org_id, folder_id, uid, name, model,
          created, created_by, updated, updated_by
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `),
      selectByUid: db.prepare<[string, number], LibraryPanelRow>(`
        SELECT * FROM library_panel WHERE uid = ? AND org_id = ?
      `),
      selectByOrg: db.prepare<[number], LibraryPanelRow>(`
        SELECT * FROM library_panel WHERE org_id = ?
      `),
      update: db.prepare<UpdateParams>(`
        UPDATE library_panel
        SET folder_id = ?, name = ?, model = ?, updated = ?, updated_by = ?
        WHERE id = ?
      `),
      deleteByUid: db.prepare<[string, number]>(`
        DELETE FROM library_panel WHERE uid = ? AND org_id = ?
      `),
    };
  }

  create(
    session: DbSession,
    user: SignedInUser,
    cmd: CreateLibraryPanelCommand,
    now: Date
  ): LibraryPanel {
    const timestamp = now.toISOString();
    const row: Omit<LibraryPanelRow, 'id'> = {
      org_id: user.org_id,
      folder_id: cmd.folder_id,
      uid: this.generateUid(),
      name: cmd.name,
      model: JSON.stringify(cmd.model),
      created: timestamp,
      updated: timestamp,
      created_by: user.user_id,
      updated_by: user.user_id,
    };

    debug('PanelRepository', 'Creating library panel', {
      uid: row.uid,
      orgId: row.org_id,
      name: row.name,
    });

    try {
      const result = session.run(
        this.statements.insert,
        row.org_id,
        row.folder_id,
        row.uid,
        row.name,
        row.model,
        row.created,
        row.created_by,
        row.updated,
        row.updated_by
      );
      return toLibraryPanel({ id: Number(result.lastInsertRowid), ...row });
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new LibraryPanelExistsError();
      }
      throw error;
    }
  }

  get(session: DbSession, uid: string, orgId: number): LibraryPanel {
    const rows = session.all(this.statements.selectByUid, uid, orgId);
    if (rows.length === 0) {
      throw new LibraryPanelNotFoundError();
    }
    if (rows.length > 1) {
      const error = new LibraryPanelInvariantError(rows.length);
      logger.error('Duplicate library panels under a unique uid:', { uid, orgId, found: rows.length });
      throw error;
    }
    return toLibraryPanel(rows[0]);
  }

  listAll(session: DbSession, orgId: number): LibraryPanel[] {
    return session.all(this.statements.selectByOrg, orgId).map(toLibraryPanel);
  }

  patch(
    session: DbSession,
    user: SignedInUser,
    uid: string,
    cmd: PatchLibraryPanelCommand,
    now: Date
  ): LibraryPanel {
    const existing = this.get(session, uid, user.org_id);

    const patched: LibraryPanelRow = {
      ...existing,
      folder_id: cmd.folder_id ? cmd.folder_id : existing.folder_id,
      name: cmd.name ? cmd.name : existing.name,
      model: JSON.stringify(cmd.model ?? existing.model),
      updated: now.toISOString(),
      updated_by: user.user_id,
    };

    debug('PanelRepository', 'Patching library panel', {
      id: existing.id,
      uid,
      fields: Object.keys(cmd),
    });

    let changes: number;
    try {
      changes = session.run(
        this.statements.update,
        patched.folder_id,
        patched.name,
        patched.model,
        patched.updated,
        patched.updated_by,
        existing.id
      ).changes;
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new LibraryPanelExistsError();
      }
      throw error;
    }
    if (changes !== 1) {
      throw new LibraryPanelNotFoundError();
    }

    return toLibraryPanel(patched);
  }

  delete(session: DbSession, uid: string, orgId: number): void {
    debug('PanelRepository', 'Deleting library panel', { uid, orgId });

    const { changes } = session.run(this.statements.deleteByUid, uid, orgId);
    if (changes !== 1) {
      throw new LibraryPanelNotFoundError();
    }
  }
}
