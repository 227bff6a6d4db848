/**
 * Metadata store
 *
 * Sidecar records of HTTP header state, one per value path, kept in a
 * top-level bucket the URL tree cannot reach. Records are written and
 * deleted in the same transaction as the value they describe.
 */

import { z } from "zod";
import type { KvBucket, KvTx } from "../engine/index.ts";
import { ConsistencyError } from "../errors.ts";
import type { MetadataRecord } from "../types.ts";
import { ROOT_SEGMENT } from "./path.ts";

/** NUL-prefixed so that no URL path can name it */
export const METADATA_BUCKET = "\u0000headers";

/** Request headers retained into a record; the rest are stamped by the server */
export const RETAINED_HEADERS = ["Content-Type", "Content-Length"] as const;

const MetadataRecordSchema = z
  .object({
    "Content-Type": z.string().optional(),
    "Content-Length": z.string().optional(),
    ETag: z.string().optional(),
    "Last-Modified": z.string().optional(),
  })
  .strip();

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// ============================================================================
// Types
// ============================================================================

export type MetadataStore = {
  get: (tx: KvTx, path: string) => MetadataRecord | null;
  put: (tx: KvTx, path: string, record: MetadataRecord) => void;
  delete: (tx: KvTx, path: string) => void;
  /** Remove every record strictly below a container path; returns the removed paths */
  deleteUnder: (tx: KvTx, path: string) => string[];
  /** Create the metadata bucket and the root record when missing */
  bootstrap: (tx: KvTx) => void;
};

// ============================================================================
// Helpers
// ============================================================================

export const encodeRecord = (record: MetadataRecord): Uint8Array =>
  encoder.encode(JSON.stringify(record));

export const decodeRecord = (bytes: Uint8Array): MetadataRecord | null => {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch {
    return null;
  }
  const parsed = MetadataRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
};

/**
 * Copy the retained request headers into a fresh record
 */
export const extractRecordHeaders = (headers: Headers): MetadataRecord => {
  const record: MetadataRecord = {};
  for (const name of RETAINED_HEADERS) {
    const value = headers.get(name);
    if (value !== null) record[name] = value;
  }
  return record;
};

/**
 * Record as response headers, in a stable order
 */
export const recordHeaders = (
  record: MetadataRecord,
  omit: readonly (keyof MetadataRecord)[] = []
): Record<string, string> => {
  const headers: Record<string, string> = {};
  for (const name of ["Content-Type", "Content-Length", "ETag", "Last-Modified"] as const) {
    const value = record[name];
    if (value !== undefined && !omit.includes(name)) headers[name] = value;
  }
  return headers;
};

// ============================================================================
// Factory
// ============================================================================

export const createMetadataStore = (): MetadataStore => {
  const bucketOf = (tx: KvTx): KvBucket => {
    const bucket = tx.bucket(METADATA_BUCKET);
    if (!bucket) {
      throw new ConsistencyError("metadata bucket is missing");
    }
    return bucket;
  };

  return {
    get: (tx, path) => {
      const bytes = bucketOf(tx).get(path);
      if (bytes === null) return null;
      const record = decodeRecord(bytes);
      if (!record) {
        throw new ConsistencyError("undecodable metadata record", { path });
      }
      return record;
    },

    put: (tx, path, record) => {
      bucketOf(tx).put(path, encodeRecord(record));
    },

    delete: (tx, path) => {
      bucketOf(tx).delete(path);
    },

    deleteUnder: (tx, path) => {
      const bucket = bucketOf(tx);
      const prefix = path.endsWith("/") ? path : `${path}/`;
      const doomed: string[] = [];
      bucket.forEach((key) => {
        if (key.startsWith(prefix) && key !== ROOT_SEGMENT) doomed.push(key);
      });
      for (const key of doomed) bucket.delete(key);
      return doomed;
    },

    bootstrap: (tx) => {
      const bucket = tx.createBucketIfNotExists(METADATA_BUCKET);
      if (bucket.get(ROOT_SEGMENT) === null) {
        bucket.put(ROOT_SEGMENT, encodeRecord({}));
      }
    },
  };
};
