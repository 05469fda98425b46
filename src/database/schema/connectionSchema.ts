// No foreign key on librarypanel_id: deleting a panel leaves its connection rows.
export const connectionSchema = `
CREATE TABLE IF NOT EXISTS library_panel_dashboard (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  librarypanel_id INTEGER NOT NULL,
  dashboard_id INTEGER NOT NULL,
  created TEXT NOT NULL,
  created_by INTEGER NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS UQE_library_panel_dashboard_librarypanel_id_dashboard_id
  ON library_panel_dashboard(librarypanel_id, dashboard_id);
`;
