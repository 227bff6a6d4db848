/**
 * Objects controller
 *
 * Maps each verb onto one engine transaction over the namespace tree and
 * the metadata store. Request bodies are buffered before the transaction
 * opens; transaction callbacks are synchronous, so a conditional check and
 * the write it guards run atomically against other writers.
 */

import type { Context } from "hono";
import { isEngineError, type KvEngine } from "../engine/index.ts";
import { ConsistencyError, httpError } from "../errors.ts";
import { checkWriteHeaders, readUpload } from "../http/body.ts";
import { respondWithListing } from "../http/listing.ts";
import { ifMatchSatisfied, ifNoneMatchSatisfied } from "../http/preconditions.ts";
import { contentRange, evaluateRange, sliceSpans, unsatisfiedRange } from "../http/range.ts";
import {
  canonicalPath,
  escapedPath,
  extractRecordHeaders,
  getOrCreateContainerChain,
  lastSegment,
  listNames,
  type MetadataStore,
  parentSegments,
  recordHeaders,
  resolveContainer,
  resolveContainerOrValue,
  splitPath,
} from "../store/index.ts";
import type { Clock, EtagProvider, Env, MetadataRecord } from "../types.ts";
import { formatLastModified } from "../util/http-date.ts";

export const ALLOWED_METHODS = "GET,PUT,DELETE,HEAD";

export type ObjectsController = {
  head: (c: Context<Env>) => Response;
  get: (c: Context<Env>) => Response | Promise<Response>;
  put: (c: Context<Env>) => Promise<Response>;
  remove: (c: Context<Env>) => Response;
  options: (c: Context<Env>) => Response;
  methodNotAllowed: (c: Context<Env>) => Response;
};

type ObjectsControllerDeps = {
  engine: KvEngine;
  metadata: MetadataStore;
  etags: EtagProvider;
  clock: Clock;
  maxBodyBytes: number;
};

type ReadOutcome =
  | { kind: "not-modified"; etag: string | undefined }
  | { kind: "listing"; names: string[] }
  | { kind: "value"; bytes: Uint8Array; record: MetadataRecord };

type WriteOutcome =
  | { kind: "containers" }
  | { kind: "value"; created: boolean; etag: string; lastModified: string };

// ============================================================================
// Helpers
// ============================================================================

const targetOf = (c: Context<Env>) => {
  const raw = escapedPath(c.req.url);
  const segments = splitPath(raw);
  return { raw, segments, path: canonicalPath(segments) };
};

const writeHeadersOf = (c: Context<Env>) => ({
  contentLength: c.req.header("Content-Length"),
  ifNoneMatch: c.req.header("If-None-Match"),
});

const notFound = () => httpError(404, "Not found.");
const preconditionFailed = () => httpError(412, "Precondition failed.");

// ============================================================================
// Factory
// ============================================================================

export const createObjectsController = (deps: ObjectsControllerDeps): ObjectsController => {
  const { engine, metadata, etags, clock, maxBodyBytes } = deps;

  const head = (c: Context<Env>): Response => {
    const { path } = targetOf(c);
    const record = engine.view((tx) => metadata.get(tx, path));
    if (!record) throw notFound();
    return c.body(null, 200, recordHeaders(record));
  };

  const read = (c: Context<Env>, segments: string[], path: string): ReadOutcome =>
    engine.view((tx): ReadOutcome => {
      const record = metadata.get(tx, path);
      if (record && ifNoneMatchSatisfied(record, c.req.header("If-None-Match"))) {
        return { kind: "not-modified", etag: record.ETag };
      }

      const container = resolveContainer(tx, parentSegments(segments));
      if (!container) throw notFound();
      if (segments.length === 1) {
        return { kind: "listing", names: listNames(container) };
      }

      const node = resolveContainerOrValue(container, lastSegment(segments));
      if (!node) throw notFound();
      if (node.kind === "container") {
        return { kind: "listing", names: listNames(node.bucket) };
      }
      if (!record) {
        throw new ConsistencyError("value has no metadata record", { path });
      }
      return { kind: "value", bytes: node.bytes, record };
    });

  const serveValue = (c: Context<Env>, bytes: Uint8Array, record: MetadataRecord): Response => {
    const range = c.req.header("Range");
    if (range === undefined) {
      return c.body(bytes.slice(), 200, recordHeaders(record));
    }

    const outcome = evaluateRange(range, bytes.byteLength);
    switch (outcome.kind) {
      case "invalid":
        throw httpError(400, "Bad request.");
      case "unsatisfiable":
        throw httpError(416, "Requested range not satisfiable.", {
          "Content-Range": unsatisfiedRange(bytes.byteLength),
        });
      case "partial": {
        const headers = recordHeaders(record, ["ETag", "Content-Length"]);
        const [only, ...rest] = outcome.spans;
        if (only && rest.length === 0) {
          headers["Content-Range"] = contentRange(only, bytes.byteLength);
        }
        return c.body(sliceSpans(bytes, outcome.spans), 206, headers);
      }
    }
  };

  return {
    head,

    get: (c) => {
      // HEAD is dispatched through the GET route
      if (c.req.method === "HEAD") return head(c);

      const { raw, segments, path } = targetOf(c);
      const outcome = read(c, segments, path);
      switch (outcome.kind) {
        case "not-modified":
          return c.body(null, 304, outcome.etag === undefined ? {} : { ETag: outcome.etag });
        case "listing":
          return respondWithListing(c, raw, outcome.names);
        case "value":
          return serveValue(c, outcome.bytes, outcome.record);
      }
    },

    put: async (c) => {
      checkWriteHeaders(writeHeadersOf(c), maxBodyBytes);
      const { segments, path } = targetOf(c);
      const contentLength = c.req.header("Content-Length");
      const bytes = await readUpload(c.req.raw, contentLength, maxBodyBytes);
      const ifMatch = c.req.header("If-Match");

      const outcome = engine.update((tx): WriteOutcome => {
        if (bytes.byteLength === 0) {
          getOrCreateContainerChain(tx, segments);
          return { kind: "containers" };
        }

        const existing = metadata.get(tx, path);
        if (!ifMatchSatisfied(existing, ifMatch)) throw preconditionFailed();
        if (segments.length < 2) {
          throw httpError(400, "Cannot PUT a value in the root bucket.");
        }

        const container = getOrCreateContainerChain(tx, parentSegments(segments));
        try {
          container.put(lastSegment(segments), bytes);
        } catch (err) {
          if (isEngineError(err, "incompatible-value")) {
            throw httpError(400, "Path conflicts with an existing entry.");
          }
          throw err;
        }

        const etag = etags.etag(bytes);
        const lastModified = formatLastModified(clock());
        metadata.put(tx, path, {
          ...extractRecordHeaders(c.req.raw.headers),
          ETag: etag,
          "Last-Modified": lastModified,
        });
        return { kind: "value", created: existing === null, etag, lastModified };
      });

      if (outcome.kind === "containers") return c.body(null, 200);

      const headers: Record<string, string> = {
        ETag: outcome.etag,
        "Last-Modified": outcome.lastModified,
      };
      if (outcome.created) {
        headers.Location = path;
        return c.body(null, 201, headers);
      }
      return c.body(null, 204, headers);
    },

    remove: (c) => {
      checkWriteHeaders(writeHeadersOf(c), maxBodyBytes);
      const { segments, path } = targetOf(c);
      if (segments.length < 2) throw httpError(400, "Invalid path.");
      const ifMatch = c.req.header("If-Match");
      const name = lastSegment(segments);

      engine.update((tx) => {
        const record = metadata.get(tx, path);
        if (!ifMatchSatisfied(record, ifMatch)) throw preconditionFailed();

        const parent = resolveContainer(tx, parentSegments(segments));
        if (record) {
          if (!parent || parent.get(name) === null) {
            throw new ConsistencyError("metadata record without a value", { path, record });
          }
          metadata.delete(tx, path);
          parent.delete(name);
          return;
        }

        if (!parent || !parent.bucket(name)) throw notFound();
        parent.deleteBucket(name);
        metadata.deleteUnder(tx, path);
      });

      return c.body(null, 204);
    },

    options: (c) => c.body(null, 200, { Allow: ALLOWED_METHODS }),

    methodNotAllowed: () => {
      throw httpError(405, "Method not allowed.", { Allow: ALLOWED_METHODS });
    },
  };
};
