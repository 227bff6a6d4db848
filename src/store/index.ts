/**
 * Store exports
 */

export {
  createMetadataStore,
  decodeRecord,
  encodeRecord,
  extractRecordHeaders,
  METADATA_BUCKET,
  type MetadataStore,
  RETAINED_HEADERS,
  recordHeaders,
} from "./metadata.ts";
export {
  getOrCreateContainerChain,
  listNames,
  resolveContainer,
  resolveContainerOrValue,
} from "./namespace.ts";
export {
  canonicalPath,
  escapedPath,
  lastSegment,
  parentSegments,
  ROOT_SEGMENT,
  splitPath,
} from "./path.ts";
