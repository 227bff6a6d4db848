/**
 * Storage engine exports
 */

export { createMemoryEngine } from "./memory.ts";
export { createSqliteEngine, type SqliteEngineOptions } from "./sqlite.ts";
export {
  compareKeys,
  EngineError,
  type EngineErrorCode,
  isEngineError,
  type KvBucket,
  type KvEngine,
  type KvTx,
} from "./types.ts";
