import Database from "better-sqlite3";
import {
  EMPTY_CREATE_FIELDS,
  EMPTY_UPDATE_BODY,
  type Message,
} from "@chatterbox/shared";
import type { Db } from "../../db/index.js";

export type StoreFailureKind = "not_found" | "validation" | "constraint";

export interface StoreFailure {
  ok: false;
  kind: StoreFailureKind;
  message: string;
}

export type StoreResult<T> = { ok: true; value: T } | StoreFailure;

export interface MessageStore {
  create(body: string, username: string): StoreResult<Message>;
  /** All messages, oldest first (ties by id). */
  listAll(): Message[];
  findById(id: number): Message | undefined;
  update(id: number, body: string): StoreResult<Message>;
  delete(id: number): StoreResult<{ id: number }>;
  count(): number;
}

export interface MessageStoreOptions {
  /** Clock used for created_at / updated_at. */
  now?: () => Date;
}

const MESSAGE_SELECT =
  "SELECT id, body, username, created_at, updated_at FROM messages";

const CREATE_CONSTRAINT_ERROR =
  "Failed to create message due to data integrity issue.";
const UPDATE_CONSTRAINT_ERROR =
  "Failed to update message due to data integrity issue.";

export function notFoundMessage(id: number | string): string {
  return `Message with id ${id} not found`;
}

function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

function fail(kind: StoreFailureKind, message: string): StoreFailure {
  return { ok: false, kind, message };
}

function isConstraintError(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    err.code.startsWith("SQLITE_CONSTRAINT")
  );
}

/**
 * Runs one unit of work. The unit is a better-sqlite3 transaction, so a throw
 * inside it has already rolled back by the time it reaches here.
 */
function guarded<T>(
  run: () => StoreResult<T>,
  constraintMessage: string,
): StoreResult<T> {
  try {
    return run();
  } catch (err) {
    if (isConstraintError(err)) return fail("constraint", constraintMessage);
    throw err;
  }
}

export function createMessageStore(
  db: Db,
  options: MessageStoreOptions = {},
): MessageStore {
  const now = options.now ?? (() => new Date());

  function getRow(id: number): Message | undefined {
    return db.prepare(`${MESSAGE_SELECT} WHERE id = ?`).get(id) as
      | Message
      | undefined;
  }

  function mustGetRow(id: number): Message {
    const row = getRow(id);
    if (!row) throw new Error(`Message ${id} vanished inside its transaction`);
    return row;
  }

  const insertTx = db.transaction(
    (body: string, username: string, createdAt: string): Message => {
      const info = db
        .prepare(
          "INSERT INTO messages (body, username, created_at, updated_at) VALUES (?, ?, ?, NULL)",
        )
        .run(body, username, createdAt);
      return mustGetRow(Number(info.lastInsertRowid));
    },
  );

  const updateTx = db.transaction(
    (id: number, body: string, stamp: string): StoreResult<Message> => {
      const existing = getRow(id);
      if (!existing) return fail("not_found", notFoundMessage(id));
      // keep created_at <= updated_at even if the clock stepped back
      const updatedAt =
        stamp < existing.created_at ? existing.created_at : stamp;
      db.prepare(
        "UPDATE messages SET body = ?, updated_at = ? WHERE id = ?",
      ).run(body, updatedAt, id);
      return ok(mustGetRow(id));
    },
  );

  const deleteTx = db.transaction((id: number): StoreResult<{ id: number }> => {
    const result = db.prepare("DELETE FROM messages WHERE id = ?").run(id);
    if (result.changes === 0) return fail("not_found", notFoundMessage(id));
    return ok({ id });
  });

  return {
    create(body, username) {
      if (!body || !username) return fail("validation", EMPTY_CREATE_FIELDS);
      return guarded(
        () => ok(insertTx(body, username, now().toISOString())),
        CREATE_CONSTRAINT_ERROR,
      );
    },

    listAll() {
      return db
        .prepare(`${MESSAGE_SELECT} ORDER BY created_at ASC, id ASC`)
        .all() as Message[];
    },

    findById(id) {
      return getRow(id);
    },

    update(id, body) {
      if (!body) return fail("validation", EMPTY_UPDATE_BODY);
      return guarded(
        () => updateTx(id, body, now().toISOString()),
        UPDATE_CONSTRAINT_ERROR,
      );
    },

    delete(id) {
      return deleteTx(id);
    },

    count() {
      const row = db
        .prepare("SELECT COUNT(*) AS count FROM messages")
        .get() as { count: number };
      return row.count;
    },
  };
}
