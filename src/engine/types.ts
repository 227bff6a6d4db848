/**
 * Storage engine contract
 *
 * An embedded, transactional key/value engine with nested buckets.
 * Writable transactions are serialized; read-only transactions see the
 * last committed state.
 *
 * Keys are strings and are enumerated in UTF-8 byte order.
 */

// ============================================================================
// Errors
// ============================================================================

export type EngineErrorCode =
  | "tx-closed"
  | "tx-read-only"
  | "tx-busy"
  | "incompatible-value"
  | "bucket-not-found"
  | "bucket-exists"
  | "key-required";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

export const isEngineError = (err: unknown, code?: EngineErrorCode): err is EngineError =>
  err instanceof EngineError && (code === undefined || err.code === code);

// ============================================================================
// Buckets & Transactions
// ============================================================================

export type KvBucket = {
  /** Value stored under `key`, or null when absent or when `key` is a nested bucket */
  get: (key: string) => Uint8Array | null;
  /** Fails with `incompatible-value` when `key` is a nested bucket */
  put: (key: string, value: Uint8Array) => void;
  /** No-op when absent; fails with `incompatible-value` when `key` is a nested bucket */
  delete: (key: string) => void;
  bucket: (key: string) => KvBucket | null;
  /** Fails with `incompatible-value` when `key` holds a value */
  createBucketIfNotExists: (key: string) => KvBucket;
  /** Removes the nested bucket and everything below it */
  deleteBucket: (key: string) => void;
  /** `value` is null for nested buckets */
  forEach: (fn: (key: string, value: Uint8Array | null) => void) => void;
};

export type KvTx = {
  readonly writable: boolean;
  /** Top-level bucket lookup */
  bucket: (name: string) => KvBucket | null;
  createBucketIfNotExists: (name: string) => KvBucket;
  deleteBucket: (name: string) => void;
  commit: () => void;
  /** No-op once the transaction is closed */
  rollback: () => void;
};

export type KvEngine = {
  begin: (writable: boolean) => KvTx;
  /** Runs `fn` in a read-only transaction, always rolled back afterwards */
  view: <T>(fn: (tx: KvTx) => T) => T;
  /** Runs `fn` in a writable transaction; commits on return, rolls back on throw */
  update: <T>(fn: (tx: KvTx) => T) => T;
  close: () => void;
};

// ============================================================================
// Helpers
// ============================================================================

const utf8 = new TextEncoder();

/**
 * Byte-order comparison of two keys (matches SQLite's BINARY collation on UTF-8)
 */
export const compareKeys = (a: string, b: string): number =>
  Buffer.compare(utf8.encode(a), utf8.encode(b));

/**
 * Shared view/update wrappers over `begin`
 */
export const withTransactions = (
  begin: (writable: boolean) => KvTx
): Pick<KvEngine, "view" | "update"> => ({
  view: (fn) => {
    const tx = begin(false);
    try {
      return fn(tx);
    } finally {
      tx.rollback();
    }
  },
  update: (fn) => {
    const tx = begin(true);
    try {
      const result = fn(tx);
      tx.commit();
      return result;
    } catch (err) {
      tx.rollback();
      throw err;
    }
  },
});
