/**
 * bucketd - Bootstrap Utilities
 *
 * Shared factory functions for creating application dependencies.
 * Used by server.ts and by the test app.
 */

import type { StorageConfig } from "./config.ts";
import { createMemoryEngine, createSqliteEngine, type KvEngine } from "./engine/index.ts";
import { createMetadataStore, type MetadataStore, ROOT_SEGMENT } from "./store/index.ts";

// ============================================================================
// Factory Functions
// ============================================================================

export const openEngine = (storage: StorageConfig): KvEngine =>
  storage.engine === "memory" ? createMemoryEngine() : createSqliteEngine({ path: storage.path });

/**
 * Create the root container, the metadata bucket and the root record
 *
 * Idempotent; any failure here is fatal to startup.
 */
export const bootstrapEngine = (
  engine: KvEngine,
  metadata: MetadataStore = createMetadataStore()
): MetadataStore => {
  engine.update((tx) => {
    tx.createBucketIfNotExists(ROOT_SEGMENT);
    metadata.bootstrap(tx);
  });
  return metadata;
};
