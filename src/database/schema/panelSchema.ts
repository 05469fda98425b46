export const panelSchema = `
CREATE TABLE IF NOT EXISTS library_panel (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  org_id INTEGER NOT NULL,
  folder_id INTEGER NOT NULL,
  uid TEXT NOT NULL,
  name TEXT NOT NULL,
  model TEXT NOT NULL,
  created TEXT NOT NULL,
  created_by INTEGER NOT NULL,
  updated TEXT NOT NULL,
  updated_by INTEGER NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS UQE_library_panel_uid ON library_panel(uid);
CREATE UNIQUE INDEX IF NOT EXISTS UQE_library_panel_org_id_folder_id_name
  ON library_panel(org_id, folder_id, name);
CREATE INDEX IF NOT EXISTS IDX_library_panel_org_id ON library_panel(org_id);
`;
