import type { FastifyBaseLogger } from 'fastify';
import type { Db } from './index.js';
import * as m001 from './migrations/001_messages.js';

export const migrations = [
  { name: '001_messages', ...m001 },
];

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

function getApplied(db: Db): Set<string> {
  db.exec(MIGRATIONS_TABLE);
  const rows = db.prepare('SELECT name FROM _migrations').all() as { name: string }[];
  return new Set(rows.map((r) => r.name));
}

/** Apply pending migrations in order. Returns the names applied by this call. */
export function runMigrations(db: Db, log?: Pick<FastifyBaseLogger, 'info'>): string[] {
  const applied = getApplied(db);
  const ran: string[] = [];
  for (const m of migrations) {
    if (applied.has(m.name)) continue;
    log?.info({ migration: m.name }, 'Applying migration');
    db.transaction(() => {
      m.up(db);
      db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(m.name);
    })();
    ran.push(m.name);
  }
  log?.info({ applied: ran.length }, 'Migrations complete');
  return ran;
}
