/**
 * bucketd - Application Assembly
 *
 * Pure assembly function that wires up all dependencies.
 * All dependencies must be injected - no fallback logic.
 */

import type { Hono } from "hono";
import type { AppConfig } from "./config.ts";
import { createObjectsController } from "./controllers/index.ts";
import type { KvEngine } from "./engine/index.ts";
import { createCsrfMiddleware, createRequestLogMiddleware } from "./middleware/index.ts";
import { createRouter } from "./router.ts";
import type { MetadataStore } from "./store/index.ts";
import type { Clock, EtagProvider, Env, Logger } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * All dependencies required by the application.
 * The engine must already be bootstrapped (see bootstrap.ts).
 */
export type AppDependencies = {
  config: AppConfig;
  engine: KvEngine;
  metadata: MetadataStore;
  etags: EtagProvider;
  clock: Clock;
  logger: Logger;
};

// ============================================================================
// App Factory
// ============================================================================

export const createApp = (deps: AppDependencies): Hono<Env> => {
  const { config, engine, metadata, etags, clock, logger } = deps;

  // Middleware
  const requestLogMiddleware = config.log.requests
    ? createRequestLogMiddleware(logger)
    : undefined;
  const csrfMiddleware = config.csrf.key
    ? createCsrfMiddleware({
        key: config.csrf.key,
        cookieName: config.csrf.cookieName,
        secure: config.csrf.secure,
      })
    : undefined;

  // Controllers
  const objects = createObjectsController({
    engine,
    metadata,
    etags,
    clock,
    maxBodyBytes: config.server.maxBodyBytes,
  });

  return createRouter({
    objects,
    requestLogMiddleware,
    csrfMiddleware,
    logger,
  });
};
