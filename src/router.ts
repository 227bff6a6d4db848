/**
 * bucketd - Hono Router
 *
 * Every path belongs to the namespace tree, so routes match on the verb
 * alone. Unsupported verbs fall through to the catch-all.
 */

import type { MiddlewareHandler } from "hono";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ObjectsController } from "./controllers/index.ts";
import { ConsistencyError, TEXT_PLAIN } from "./errors.ts";
import { isEngineError } from "./engine/index.ts";
import { escapedPath } from "./store/index.ts";
import type { Env, Logger } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type RouterDeps = {
  // Controllers
  objects: ObjectsController;
  // Middleware
  requestLogMiddleware?: MiddlewareHandler<Env>;
  csrfMiddleware?: MiddlewareHandler<Env>;
  logger: Logger;
};

// ============================================================================
// Router Factory
// ============================================================================

export const createRouter = (deps: RouterDeps): Hono<Env> => {
  const { objects, logger } = deps;
  const app = new Hono<Env>();

  if (deps.requestLogMiddleware) {
    app.use("*", deps.requestLogMiddleware);
  }
  if (deps.csrfMiddleware) {
    app.use("*", deps.csrfMiddleware);
  }

  // ============================================================================
  // Namespace
  // ============================================================================

  app.options("*", objects.options);
  app.get("*", objects.get);
  app.put("*", objects.put);
  app.delete("*", objects.remove);
  app.all("*", objects.methodNotAllowed);

  // ============================================================================
  // Errors
  // ============================================================================

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error("request failed", {
      method: c.req.method,
      path: escapedPath(c.req.url),
      kind: err instanceof ConsistencyError ? "consistency" : isEngineError(err) ? err.code : err.name,
      error: err,
      ...(err instanceof ConsistencyError ? err.context : {}),
    });
    return c.body("Internal server error.\n", 500, { "Content-Type": TEXT_PLAIN });
  });

  return app;
};
