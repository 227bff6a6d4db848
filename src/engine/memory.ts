/**
 * In-memory storage engine
 *
 * Used by tests and by `--memory`. A writable transaction works on a copy of
 * the committed tree and publishes it on commit, so readers never observe a
 * half-applied write.
 */

import {
  compareKeys,
  EngineError,
  type KvBucket,
  type KvEngine,
  type KvTx,
  withTransactions,
} from "./types.ts";

// ============================================================================
// Tree
// ============================================================================

type MemoryNode = { kind: "bucket"; children: Children } | { kind: "value"; bytes: Uint8Array };

type Children = Map<string, MemoryNode>;

const cloneChildren = (children: Children): Children => {
  const copy: Children = new Map();
  for (const [key, node] of children) {
    copy.set(
      key,
      node.kind === "bucket" ? { kind: "bucket", children: cloneChildren(node.children) } : node
    );
  }
  return copy;
};

// ============================================================================
// Factory
// ============================================================================

export const createMemoryEngine = (): KvEngine => {
  let committed: Children = new Map();
  let writerOpen = false;
  let closed = false;

  const begin = (writable: boolean): KvTx => {
    if (closed) {
      throw new EngineError("tx-closed", "engine is closed");
    }
    if (writable && writerOpen) {
      throw new EngineError("tx-busy", "a writable transaction is already open");
    }
    if (writable) writerOpen = true;

    const root = writable ? cloneChildren(committed) : committed;
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

    const lookupBucket = (children: Children, key: string): KvBucket | null => {
      ensureOpen();
      const node = children.get(key);
      return node?.kind === "bucket" ? wrap(node.children) : null;
    };

    const createBucket = (children: Children, key: string): KvBucket => {
      ensureWritable();
      ensureKey(key);
      const node = children.get(key);
      if (node?.kind === "value") {
        throw new EngineError("incompatible-value", `key "${key}" holds a value`);
      }
      if (node) return wrap(node.children);
      const created: Children = new Map();
      children.set(key, { kind: "bucket", children: created });
      return wrap(created);
    };

    const removeBucket = (children: Children, key: string): void => {
      ensureWritable();
      const node = children.get(key);
      if (!node) throw new EngineError("bucket-not-found", `bucket "${key}" not found`);
      if (node.kind === "value") {
        throw new EngineError("incompatible-value", `key "${key}" holds a value`);
      }
      children.delete(key);
    };

    const wrap = (children: Children): KvBucket => ({
      get: (key) => {
        ensureOpen();
        const node = children.get(key);
        return node?.kind === "value" ? node.bytes : null;
      },
      put: (key, value) => {
        ensureWritable();
        ensureKey(key);
        if (children.get(key)?.kind === "bucket") {
          throw new EngineError("incompatible-value", `key "${key}" is a bucket`);
        }
        children.set(key, { kind: "value", bytes: value.slice() });
      },
      delete: (key) => {
        ensureWritable();
        if (children.get(key)?.kind === "bucket") {
          throw new EngineError("incompatible-value", `key "${key}" is a bucket`);
        }
        children.delete(key);
      },
      bucket: (key) => lookupBucket(children, key),
      createBucketIfNotExists: (key) => createBucket(children, key),
      deleteBucket: (key) => removeBucket(children, key),
      forEach: (fn) => {
        ensureOpen();
        const keys = [...children.keys()].sort(compareKeys);
        for (const key of keys) {
          const node = children.get(key);
          if (node) fn(key, node.kind === "value" ? node.bytes : null);
        }
      },
    });

    const close = () => {
      open = false;
      if (writable) writerOpen = false;
    };

    return {
      writable,
      bucket: (name) => lookupBucket(root, name),
      createBucketIfNotExists: (name) => createBucket(root, name),
      deleteBucket: (name) => removeBucket(root, name),
      commit: () => {
        ensureOpen();
        if (writable) committed = root;
        close();
      },
      rollback: () => {
        if (open) close();
      },
    };
  };

  return {
    begin,
    ...withTransactions(begin),
    close: () => {
      closed = true;
    },
  };
};
