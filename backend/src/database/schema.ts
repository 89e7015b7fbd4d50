// Applied on every start; statements must stay idempotent
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS recipient_prefs (
  recipient_id TEXT PRIMARY KEY,
  language TEXT NOT NULL,
  view_mode TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);
`;
