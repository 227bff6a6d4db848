/**
 * CSRF Middleware
 *
 * Double-submit protection. The real token lives in a signed cookie; every
 * safe response carries a freshly masked copy in `X-CSRF-Token`
 * (base64 of a one-time pad followed by pad XOR token), so the header value
 * differs on each response while unmasking to the same token.
 *
 * Unsafe methods must present a masked token that unmasks to the cookie's.
 */

import { randomBytes, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { getSignedCookie, setSignedCookie } from "hono/cookie";
import { httpError } from "../errors.ts";
import type { Env } from "../types.ts";

export const CSRF_HEADER = "X-CSRF-Token";
export const TOKEN_LENGTH = 32;

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS", "TRACE"]);
const COOKIE_MAX_AGE = 12 * 60 * 60;

// ============================================================================
// Types
// ============================================================================

export type CsrfMiddlewareDeps = {
  /** Cookie signing key, exactly 32 bytes */
  key: string;
  cookieName: string;
  secure: boolean;
};

// ============================================================================
// Token masking
// ============================================================================

const xor = (a: Uint8Array, b: Uint8Array): Buffer => {
  const out = Buffer.alloc(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return out;
};

export const maskToken = (token: Uint8Array): string => {
  const pad = randomBytes(token.length);
  return Buffer.concat([pad, xor(pad, token)]).toString("base64");
};

/**
 * Recover the real token from a masked one; null when malformed
 */
export const unmaskToken = (masked: string): Buffer | null => {
  const bytes = Buffer.from(masked, "base64");
  if (bytes.length !== TOKEN_LENGTH * 2) return null;
  return xor(bytes.subarray(0, TOKEN_LENGTH), bytes.subarray(TOKEN_LENGTH));
};

const decodeStoredToken = (value: string | false | undefined): Buffer | null => {
  if (typeof value !== "string") return null;
  const token = Buffer.from(value, "base64");
  return token.length === TOKEN_LENGTH ? token : null;
};

// ============================================================================
// Middleware Factory
// ============================================================================

export const createCsrfMiddleware = (deps: CsrfMiddlewareDeps): MiddlewareHandler<Env> => {
  const { key, cookieName, secure } = deps;

  return async (c, next) => {
    const stored = decodeStoredToken(await getSignedCookie(c, key, cookieName));

    if (SAFE_METHODS.has(c.req.method)) {
      let token = stored;
      if (!token) {
        token = randomBytes(TOKEN_LENGTH);
        await setSignedCookie(c, cookieName, token.toString("base64"), key, {
          path: "/",
          httpOnly: true,
          secure,
          sameSite: "Lax",
          maxAge: COOKIE_MAX_AGE,
        });
      }
      const masked = maskToken(token);
      c.set("csrfToken", masked);
      c.header(CSRF_HEADER, masked);
      await next();
      return;
    }

    const header = c.req.header(CSRF_HEADER);
    const presented = header === undefined ? null : unmaskToken(header);
    if (!stored || !presented || !timingSafeEqual(stored, presented)) {
      throw httpError(403, "Forbidden - CSRF token invalid.");
    }
    await next();
  };
};
