export const SCHEMA_VERSION = 1;

export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS activity_summaries (
  summary_id INTEGER PRIMARY KEY,
  app_class TEXT NOT NULL,
  activity_details TEXT NOT NULL DEFAULT '',
  total_duration_seconds INTEGER NOT NULL CHECK(total_duration_seconds >= 0),
  session_count INTEGER NOT NULL CHECK(session_count > 0),
  first_seen INTEGER NOT NULL,
  last_seen INTEGER NOT NULL,
  submitted_at INTEGER NOT NULL,
  CHECK(last_seen >= first_seen)
);

CREATE TABLE IF NOT EXISTS activity_sessions (
  session_id INTEGER PRIMARY KEY,
  start_time INTEGER NOT NULL,
  end_time INTEGER NOT NULL,
  app_class TEXT NOT NULL,
  window_title TEXT NOT NULL DEFAULT '',
  duration_seconds INTEGER NOT NULL CHECK(duration_seconds >= 0),
  created_at INTEGER NOT NULL,
  CHECK(end_time >= start_time)
);

CREATE INDEX IF NOT EXISTS idx_summaries_app ON activity_summaries(app_class);
CREATE INDEX IF NOT EXISTS idx_summaries_submitted ON activity_summaries(submitted_at);
CREATE INDEX IF NOT EXISTS idx_sessions_app ON activity_sessions(app_class);
CREATE INDEX IF NOT EXISTS idx_sessions_start ON activity_sessions(start_time);
`;
