/**
 * SQLite storage engine (better-sqlite3)
 *
 * Nested buckets are rows of a single `nodes` table: a bucket row has a NULL
 * value, a value row holds the bytes. Top-level buckets have parent 0.
 * `name` uses SQLite's BINARY collation, so enumeration follows UTF-8 byte order.
 */

import Database from "better-sqlite3";
import {
  EngineError,
  type KvBucket,
  type KvEngine,
  type KvTx,
  withTransactions,
} from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type SqliteEngineOptions = {
  /** Database file, or ":memory:" */
  path: string;
};

type NodeRow = {
  id: number;
  value: Buffer | null;
};

type ChildRow = {
  name: string;
  value: Buffer | null;
};

const TOP_LEVEL = 0;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS nodes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  parent INTEGER NOT NULL,
  name TEXT NOT NULL,
  value BLOB,
  UNIQUE (parent, name)
);
`;

// ============================================================================
// Factory
// ============================================================================

export const createSqliteEngine = (options: SqliteEngineOptions): KvEngine => {
  const db = new Database(options.path);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);

  const selectNode = db.prepare<[number, string], NodeRow>(
    "SELECT id, value FROM nodes WHERE parent = ? AND name = ?"
  );
  const selectChildren = db.prepare<[number], ChildRow>(
    "SELECT name, value FROM nodes WHERE parent = ? ORDER BY name"
  );
  const insertBucket = db.prepare<[number, string]>(
    "INSERT INTO nodes (parent, name, value) VALUES (?, ?, NULL)"
  );
  const upsertValue = db.prepare<[number, string, Buffer]>(
    "INSERT INTO nodes (parent, name, value) VALUES (?, ?, ?) " +
      "ON CONFLICT (parent, name) DO UPDATE SET value = excluded.value"
  );
  const deleteNode = db.prepare<[number]>("DELETE FROM nodes WHERE id = ?");
  const deleteSubtree = db.prepare<[number]>(
    `WITH RECURSIVE subtree(id) AS (
       SELECT ?
       UNION ALL
       SELECT nodes.id FROM nodes JOIN subtree ON nodes.parent = subtree.id
     )
     DELETE FROM nodes WHERE id IN (SELECT id FROM subtree)`
  );

  let active: KvTx | null = null;

  const begin = (writable: boolean): KvTx => {
    if (active) {
      throw new EngineError("tx-busy", "a transaction is already open on this connection");
    }
    db.exec(writable ? "BEGIN IMMEDIATE" : "BEGIN");
    let open = true;

    const ensureOpen = () => {
      if (!open) throw new EngineError("tx-closed", "transaction is closed");
    };
    const ensureWritable = () => {
      ensureOpen();
      if (!writable) throw new EngineError("tx-read-only", "transaction is read-only");
    };
    const ensureKey = (key: string) => {
      if (key.length === 0) throw new EngineError("key-required", "key must not be empty");
    };

    const lookupBucket = (parent: number, key: string): KvBucket | null => {
      ensureOpen();
      const row = selectNode.get(parent, key);
      return row && row.value === null ? wrap(row.id) : null;
    };

    const createBucket = (parent: number, key: string): KvBucket => {
      ensureWritable();
      ensureKey(key);
      const row = selectNode.get(parent, key);
      if (row && row.value !== null) {
        throw new EngineError("incompatible-value", `key "${key}" holds a value`);
      }
      if (row) return wrap(row.id);
      const result = insertBucket.run(parent, key);
      return wrap(Number(result.lastInsertRowid));
    };

    const removeBucket = (parent: number, key: string): void => {
      ensureWritable();
      const row = selectNode.get(parent, key);
      if (!row) throw new EngineError("bucket-not-found", `bucket "${key}" not found`);
      if (row.value !== null) {
        throw new EngineError("incompatible-value", `key "${key}" holds a value`);
      }
      deleteSubtree.run(row.id);
    };

    const wrap = (id: number): KvBucket => ({
      get: (key) => {
        ensureOpen();
        const row = selectNode.get(id, key);
        return row?.value ?? null;
      },
      put: (key, value) => {
        ensureWritable();
        ensureKey(key);
        const row = selectNode.get(id, key);
        if (row && row.value === null) {
          throw new EngineError("incompatible-value", `key "${key}" is a bucket`);
        }
        upsertValue.run(id, key, Buffer.from(value));
      },
      delete: (key) => {
        ensureWritable();
        const row = selectNode.get(id, key);
        if (!row) return;
        if (row.value === null) {
          throw new EngineError("incompatible-value", `key "${key}" is a bucket`);
        }
        deleteNode.run(row.id);
      },
      bucket: (key) => lookupBucket(id, key),
      createBucketIfNotExists: (key) => createBucket(id, key),
      deleteBucket: (key) => removeBucket(id, key),
      forEach: (fn) => {
        ensureOpen();
        for (const row of selectChildren.all(id)) {
          fn(row.name, row.value);
        }
      },
    });

    const close = () => {
      open = false;
      if (active === tx) active = null;
    };

    const tx: KvTx = {
      writable,
      bucket: (name) => lookupBucket(TOP_LEVEL, name),
      createBucketIfNotExists: (name) => createBucket(TOP_LEVEL, name),
      deleteBucket: (name) => removeBucket(TOP_LEVEL, name),
      commit: () => {
        ensureOpen();
        db.exec("COMMIT");
        close();
      },
      rollback: () => {
        if (!open) return;
        close();
        if (db.inTransaction) db.exec("ROLLBACK");
      },
    };
    active = tx;
    return tx;
  };

  return {
    begin,
    ...withTransactions(begin),
    close: () => {
      active?.rollback();
      db.close();
    },
  };
};
