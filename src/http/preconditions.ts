/**
 * Conditional requests
 *
 * Both checks compare against the record currently stored for the target
 * path, never against the body a client is about to write. Entity tags are
 * compared verbatim.
 */

import type { MetadataRecord } from "../types.ts";

/**
 * Split a list header into its entity tags; null when the header is absent
 */
export const parseEntityTags = (header: string | null | undefined): string[] | null => {
  if (header === null || header === undefined) return null;
  return header.split(",").map((tag) => tag.trim());
};

/**
 * True when a read should answer "not modified"
 */
export const ifNoneMatchSatisfied = (
  record: MetadataRecord,
  header: string | null | undefined
): boolean => {
  const tags = parseEntityTags(header);
  if (!tags) return false;
  return tags.some((tag) => tag === "*" || tag === record.ETag);
};

/**
 * True when a write or delete may proceed
 */
export const ifMatchSatisfied = (
  record: MetadataRecord | null,
  header: string | null | undefined
): boolean => {
  const tags = parseEntityTags(header);
  if (!record) {
    // "*" demands an existing resource
    return !tags || !tags.includes("*");
  }
  if (!tags) return true;
  return tags.some((tag) => tag === "*" || tag === record.ETag);
};
