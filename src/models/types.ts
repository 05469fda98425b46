export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Visual definition of a panel. Stored as JSON text, never interpreted. */
export type PanelModel = { [key: string]: JsonValue };

export interface LibraryPanel {
  id: number;
  org_id: number;
  folder_id: number;
  uid: string;
  name: string;
  model: PanelModel;
  created: string;
  updated: string;
  created_by: number;
  updated_by: number;
}

export interface LibraryPanelConnection {
  id: number;
  librarypanel_id: number;
  dashboard_id: number;
  created: string;
  created_by: number;
}

export interface SignedInUser {
  user_id: number;
  org_id: number;
}

export interface RequestContext {
  user: SignedInUser;
  signal?: AbortSignal;
}

export interface CreateLibraryPanelCommand {
  folder_id: number;
  name: string;
  model: PanelModel;
}

/** Zero folder, empty name and missing model keep the stored value. */
export interface PatchLibraryPanelCommand {
  folder_id?: number;
  name?: string;
  model?: PanelModel | null;
}
