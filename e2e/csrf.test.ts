/**
 * E2E Tests: CSRF Protection
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CSRF_HEADER } from "../src/middleware/index.ts";
import { createE2EContext, type E2EContext, ENGINES } from "./setup.ts";

const KEY = "test-secret-test-secret-test-sec";

describe.each(ENGINES)("CSRF (%s engine)", (_name, createEngine) => {
  let ctx: E2EContext;

  beforeEach(async () => {
    ctx = await createE2EContext(createEngine, { config: { csrf: { key: KEY } } });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  /** GET the root and return the cookie pair plus the masked token */
  const issueToken = async () => {
    const res = await ctx.helpers.get("/");
    const cookie = (res.headers.get("Set-Cookie") ?? "").split(";")[0] ?? "";
    return { cookie, token: res.headers.get(CSRF_HEADER) ?? "" };
  };

  it("should set a signed cookie and a masked token on safe requests", async () => {
    const res = await ctx.helpers.get("/");
    const setCookie = res.headers.get("Set-Cookie") ?? "";

    expect(res.status).toBe(200);
    expect(setCookie.startsWith("bucketd_csrf=")).toBe(true);
    expect(setCookie).toContain("HttpOnly");
    expect(setCookie).toContain("SameSite=Lax");
    expect(Buffer.from(res.headers.get(CSRF_HEADER) ?? "", "base64")).toHaveLength(64);
  });

  it("should reject a PUT without a token", async () => {
    const res = await ctx.helpers.put("/foo", "value");

    expect(res.status).toBe(403);
    expect(await res.text()).toBe("Forbidden - CSRF token invalid.\n");
    expect(ctx.helpers.valuePaths()).toEqual([]);
  });

  it("should reject a token without its cookie", async () => {
    const { token } = await issueToken();

    const res = await ctx.helpers.put("/foo", "value", { [CSRF_HEADER]: token });

    expect(res.status).toBe(403);
  });

  it("should accept a token with its cookie", async () => {
    const { cookie, token } = await issueToken();

    const res = await ctx.helpers.put("/foo", "value", { Cookie: cookie, [CSRF_HEADER]: token });

    expect(res.status).toBe(201);
  });

  it("should accept every masked copy of the same token", async () => {
    const { cookie, token } = await issueToken();
    const again = await ctx.helpers.get("/", { Cookie: cookie });
    const second = again.headers.get(CSRF_HEADER) ?? "";

    expect(again.headers.get("Set-Cookie")).toBeNull();
    expect(second).not.toBe(token);

    const res = await ctx.helpers.request("DELETE", "/missing", {
      headers: { Cookie: cookie, [CSRF_HEADER]: second },
    });
    expect(res.status).toBe(404);
  });

  it("should embed the token in HTML listings", async () => {
    const res = await ctx.helpers.get("/", { Accept: "text/html" });
    const token = res.headers.get(CSRF_HEADER) ?? "";

    expect(await res.text()).toContain(`<meta name="csrf-token" content="${token}">`);
  });
});
