/**
 * bucketd - Type Definitions
 */

import type { KvBucket } from "./engine/index.ts";

// ============================================================================
// Metadata
// ============================================================================

/**
 * Sidecar header state of one value, keyed by header name as served
 */
export type MetadataRecord = {
  "Content-Type"?: string;
  "Content-Length"?: string;
  ETag?: string;
  /** RFC 1123 with numeric zone, UTC */
  "Last-Modified"?: string;
};

// ============================================================================
// Namespace
// ============================================================================

export type NamespaceNode =
  | { kind: "container"; bucket: KvBucket }
  | { kind: "value"; bytes: Uint8Array };

// ============================================================================
// Providers
// ============================================================================

export type EtagProvider = {
  etag: (bytes: Uint8Array) => string;
};

export type Clock = () => Date;

export type Logger = {
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
};

// ============================================================================
// Hono Environment
// ============================================================================

export type Env = {
  Variables: {
    /** Masked CSRF token issued for this response, when CSRF protection is on */
    csrfToken?: string;
  };
};
