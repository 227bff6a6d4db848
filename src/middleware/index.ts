/**
 * Middleware exports
 */

export {
  CSRF_HEADER,
  type CsrfMiddlewareDeps,
  createCsrfMiddleware,
  maskToken,
  unmaskToken,
} from "./csrf.ts";

export { createRequestLogMiddleware } from "./request-log.ts";
