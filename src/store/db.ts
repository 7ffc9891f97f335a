import Database from "better-sqlite3";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id                     INTEGER PRIMARY KEY AUTOINCREMENT,
  platform               TEXT NOT NULL CHECK(platform IN ('telegram','discord','reddit')),
  platform_user_id       TEXT NOT NULL,
  username               TEXT,
  state                  TEXT NOT NULL DEFAULT 'new'
                         CHECK(state IN ('new','awaiting_consent','active','paused')),
  persona                TEXT NOT NULL,
  timezone               TEXT NOT NULL,
  daily_message_count    INTEGER NOT NULL DEFAULT 0,
  count_window_start     TEXT,
  last_inbound_at        INTEGER,
  last_outbound_at       INTEGER,
  next_scheduled_contact INTEGER,
  unreachable            INTEGER NOT NULL DEFAULT 0,
  created_at             INTEGER NOT NULL,
  UNIQUE (platform, platform_user_id)
);
CREATE INDEX IF NOT EXISTS idx_users_due
  ON users(next_scheduled_contact) WHERE state = 'active' AND unreachable = 0;

CREATE TABLE IF NOT EXISTS messages (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id    INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  sender     TEXT NOT NULL CHECK(sender IN ('user','agent')),
  text       TEXT NOT NULL,
  timestamp  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_messages_user ON messages(user_id, id);
`;

export class StoreDB {
  private db: Database.Database;

  /** `file` comes from resolveDatabasePath, or is ":memory:". */
  constructor(file: string) {
    this.db = new Database(file);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
