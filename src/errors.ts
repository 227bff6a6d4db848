/**
 * Error taxonomy
 *
 * - Client errors are `HTTPException`s carrying a ready plain-text response.
 * - `ConsistencyError` marks an internal fault: the stored state breaks an
 *   invariant (root bucket missing, metadata without a value, ...).
 * - Engine failures surface as `EngineError` (see engine/types.ts).
 */

import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";

export const TEXT_PLAIN = "text/plain; charset=utf-8";

/**
 * Build an `HTTPException` whose response body is `message` plus a newline
 */
export const httpError = (
  status: ContentfulStatusCode,
  message: string,
  headers?: Record<string, string>
): HTTPException =>
  new HTTPException(status, {
    message,
    res: new Response(`${message}\n`, {
      status,
      headers: { "Content-Type": TEXT_PLAIN, ...headers },
    }),
  });

export class ConsistencyError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "ConsistencyError";
    this.context = context;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
