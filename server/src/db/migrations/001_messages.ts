/**
 * Messages: body + author, with creation and last-edit timestamps.
 * AUTOINCREMENT keeps ids from being reused after a delete.
 */
export const up = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      body TEXT NOT NULL CHECK (length(body) > 0),
      username TEXT NOT NULL CHECK (length(username) > 0),
      created_at TEXT NOT NULL,
      updated_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_messages_created_at ON messages(created_at, id);
  `);
};

export const down = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    DROP INDEX IF EXISTS idx_messages_created_at;
    DROP TABLE IF EXISTS messages;
  `);
};
