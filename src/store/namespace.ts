/**
 * Namespace navigation
 *
 * Walks the container chain of a segment list inside a transaction. The
 * first segment is always the root container, created at startup.
 */

import { isEngineError, type KvBucket, type KvTx } from "../engine/index.ts";
import { ConsistencyError, httpError } from "../errors.ts";
import type { NamespaceNode } from "../types.ts";

const rootOf = (tx: KvTx, segments: readonly string[]): KvBucket => {
  const [rootName] = segments;
  const root = rootName === undefined ? null : tx.bucket(rootName);
  if (!root) {
    throw new ConsistencyError("root bucket is missing", { segments });
  }
  return root;
};

/**
 * Container addressed by `segments`, or null when any segment is not a container
 */
export const resolveContainer = (tx: KvTx, segments: readonly string[]): KvBucket | null => {
  let bucket: KvBucket | null = rootOf(tx, segments);
  for (const segment of segments.slice(1)) {
    bucket = bucket.bucket(segment);
    if (!bucket) return null;
  }
  return bucket;
};

export const resolveContainerOrValue = (
  container: KvBucket,
  name: string
): NamespaceNode | null => {
  const bucket = container.bucket(name);
  if (bucket) return { kind: "container", bucket };
  const bytes = container.get(name);
  return bytes === null ? null : { kind: "value", bytes };
};

/**
 * Create every missing container along `segments`; existing ones are reused
 */
export const getOrCreateContainerChain = (tx: KvTx, segments: readonly string[]): KvBucket => {
  let bucket = rootOf(tx, segments);
  for (const segment of segments.slice(1)) {
    try {
      bucket = bucket.createBucketIfNotExists(segment);
    } catch (err) {
      if (isEngineError(err, "incompatible-value")) {
        throw httpError(400, "Path conflicts with an existing entry.");
      }
      throw err;
    }
  }
  return bucket;
};

/**
 * Child names in engine order
 */
export const listNames = (container: KvBucket): string[] => {
  const names: string[] = [];
  container.forEach((key) => {
    names.push(key);
  });
  return names;
};
