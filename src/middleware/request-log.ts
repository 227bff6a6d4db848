/**
 * Request logging through the app logger
 */

import type { MiddlewareHandler } from "hono";
import { logger } from "hono/logger";
import type { Env, Logger } from "../types.ts";

export const createRequestLogMiddleware = (log: Logger): MiddlewareHandler<Env> =>
  logger((message, ...rest) => log.info([message, ...rest].join(" ")));
