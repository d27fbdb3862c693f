import type { FastifyInstance } from "fastify";
import { buildApp, type BuildAppOptions } from "./app.js";
import { closeDb, openDb, type Db } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import {
  createMessageStore,
  type MessageStore,
} from "./modules/messages/index.js";

export const EPOCH = "2024-01-01T00:00:00.000Z";

/** Clock that starts at `start` and moves forward `stepMs` on every call. */
export function steppingClock(start = EPOCH, stepMs = 1000): () => Date {
  let next = Date.parse(start);
  return () => {
    const current = new Date(next);
    next += stepMs;
    return current;
  };
}

/** Migrated in-memory database. */
export function memoryDb(): Db {
  const db = openDb(":memory:");
  runMigrations(db);
  return db;
}

export interface TestContext {
  db: Db;
  store: MessageStore;
  app: FastifyInstance;
  close(): Promise<void>;
}

export async function buildTestApp(
  options: {
    now?: () => Date;
    store?: (db: Db) => MessageStore;
  } & Partial<Omit<BuildAppOptions, "store">> = {},
): Promise<TestContext> {
  const { now, store: makeStore, ...appOptions } = options;
  const db = memoryDb();
  const store = makeStore
    ? makeStore(db)
    : createMessageStore(db, { now: now ?? steppingClock() });
  const app = await buildApp({
    logger: false,
    swaggerUi: false,
    ...appOptions,
    store,
  });
  return {
    db,
    store,
    app,
    async close() {
      await app.close();
      closeDb(db);
    },
  };
}
