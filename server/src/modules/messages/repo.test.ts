import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeDb, type Db } from "../../db/index.js";
import { EPOCH, memoryDb, steppingClock } from "../../testing.js";
import { createMessageStore, type MessageStore } from "./repo.js";

describe("createMessageStore", () => {
  let db: Db;
  let store: MessageStore;

  beforeEach(() => {
    db = memoryDb();
    store = createMessageStore(db, { now: steppingClock() });
  });

  afterEach(() => {
    closeDb(db);
  });

  describe("create", () => {
    it("assigns an id and stamps created_at", () => {
      const result = store.create("hi", "ana");
      expect(result).toEqual({
        ok: true,
        value: {
          id: 1,
          body: "hi",
          username: "ana",
          created_at: EPOCH,
          updated_at: null,
        },
      });
    });

    it("rejects empty fields without writing", () => {
      expect(store.create("", "ana")).toEqual({
        ok: false,
        kind: "validation",
        message: "Body and username cannot be empty.",
      });
      expect(store.create("hi", "")).toMatchObject({ ok: false, kind: "validation" });
      expect(store.count()).toBe(0);
    });

    it("reports a refused insert and writes nothing", () => {
      db.exec(`
        CREATE TRIGGER forbid_word AFTER INSERT ON messages
        WHEN NEW.body = 'forbidden'
        BEGIN SELECT RAISE(ABORT, 'forbidden word'); END;
      `);
      expect(store.create("forbidden", "ana")).toEqual({
        ok: false,
        kind: "constraint",
        message: "Failed to create message due to data integrity issue.",
      });
      expect(store.count()).toBe(0);
    });
  });

  describe("listAll", () => {
    it("is empty for an empty store", () => {
      expect(store.listAll()).toEqual([]);
    });

    it("orders by created_at, oldest first", () => {
      const clock = steppingClock("2024-01-01T00:00:10.000Z", -1000);
      const backwards = createMessageStore(db, { now: clock });
      backwards.create("third", "c");
      backwards.create("second", "b");
      backwards.create("first", "a");
      expect(backwards.listAll().map((m) => m.body)).toEqual([
        "first",
        "second",
        "third",
      ]);
    });

    it("breaks created_at ties by id", () => {
      const frozen = createMessageStore(db, { now: () => new Date(EPOCH) });
      frozen.create("a", "x");
      frozen.create("b", "x");
      frozen.create("c", "x");
      expect(frozen.listAll().map((m) => m.id)).toEqual([1, 2, 3]);
    });
  });

  describe("findById", () => {
    it("returns undefined for an unknown id", () => {
      expect(store.findById(42)).toBeUndefined();
    });

    it("returns the stored message", () => {
      store.create("hi", "ana");
      expect(store.findById(1)?.username).toBe("ana");
    });
  });

  describe("update", () => {
    it("changes body and updated_at only", () => {
      store.create("hi", "ana");
      const result = store.update(1, "hi there");
      expect(result).toEqual({
        ok: true,
        value: {
          id: 1,
          body: "hi there",
          username: "ana",
          created_at: EPOCH,
          updated_at: "2024-01-01T00:00:01.000Z",
        },
      });
    });

    it("advances updated_at on every update", () => {
      store.create("hi", "ana");
      store.update(1, "same");
      const again = store.update(1, "same");
      expect(again.ok && again.value.updated_at).toBe("2024-01-01T00:00:02.000Z");
      expect(store.findById(1)?.body).toBe("same");
    });

    it("never stamps updated_at before created_at", () => {
      const clock = steppingClock("2024-01-01T00:00:10.000Z", -5000);
      const skewed = createMessageStore(db, { now: clock });
      skewed.create("hi", "ana");
      const result = skewed.update(1, "later");
      expect(result.ok && result.value.updated_at).toBe("2024-01-01T00:00:10.000Z");
    });

    it("reports an unknown id", () => {
      expect(store.update(999999, "x")).toEqual({
        ok: false,
        kind: "not_found",
        message: "Message with id 999999 not found",
      });
    });

    it("rejects an empty body and keeps the row", () => {
      store.create("hi", "ana");
      expect(store.update(1, "")).toEqual({
        ok: false,
        kind: "validation",
        message: "Message body cannot be empty.",
      });
      expect(store.findById(1)).toMatchObject({ body: "hi", updated_at: null });
    });

    it("rolls back when the database refuses the write", () => {
      store.create("hi", "ana");
      db.exec(`
        CREATE TRIGGER forbid_word AFTER UPDATE ON messages
        WHEN NEW.body = 'forbidden'
        BEGIN SELECT RAISE(ABORT, 'forbidden word'); END;
      `);
      expect(store.update(1, "forbidden")).toEqual({
        ok: false,
        kind: "constraint",
        message: "Failed to update message due to data integrity issue.",
      });
      expect(store.findById(1)).toMatchObject({ body: "hi", updated_at: null });
    });
  });

  describe("delete", () => {
    it("removes the row", () => {
      store.create("hi", "ana");
      expect(store.delete(1)).toEqual({ ok: true, value: { id: 1 } });
      expect(store.findById(1)).toBeUndefined();
    });

    it("reports a second delete as not found", () => {
      store.create("hi", "ana");
      store.delete(1);
      expect(store.delete(1)).toEqual({
        ok: false,
        kind: "not_found",
        message: "Message with id 1 not found",
      });
    });
  });

  it("propagates unexpected database failures", () => {
    closeDb(db);
    expect(() => store.listAll()).toThrow();
  });
});
