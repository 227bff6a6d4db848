/**
 * Tests for bounded request bodies
 */

import { HTTPException } from "hono/http-exception";
import { describe, expect, it } from "vitest";
import { checkWriteHeaders, readBoundedBody, readUpload } from "../body.ts";

const upload = (body?: string) =>
  new Request("http://localhost/foo", { method: "PUT", body });

/**
 * Status and body of the HTTPException thrown by `fn`
 */
const failure = async (fn: () => unknown): Promise<[number, string] | null> => {
  try {
    await fn();
  } catch (err) {
    if (err instanceof HTTPException) {
      return [err.status, await err.getResponse().text()];
    }
    throw err;
  }
  return null;
};

describe("checkWriteHeaders", () => {
  it("should pass ordinary headers", async () => {
    expect(
      await failure(() => checkWriteHeaders({ contentLength: "5", ifNoneMatch: undefined }, 16))
    ).toBeNull();
  });

  it("should reject a declared length over the limit", async () => {
    expect(
      await failure(() => checkWriteHeaders({ contentLength: "17", ifNoneMatch: undefined }, 16))
    ).toEqual([400, "Request too large.\n"]);
  });

  it("should reject a malformed length", async () => {
    expect(
      await failure(() => checkWriteHeaders({ contentLength: "five", ifNoneMatch: undefined }, 16))
    ).toEqual([400, "Bad request.\n"]);
  });

  it("should reject If-None-Match on writes", async () => {
    expect(
      await failure(() => checkWriteHeaders({ contentLength: undefined, ifNoneMatch: "*" }, 16))
    ).toEqual([412, "Precondition failed.\n"]);
  });
});

describe("readBoundedBody", () => {
  it("should read the whole body", async () => {
    const bytes = await readBoundedBody(upload("hello"), 16);

    expect(new TextDecoder().decode(bytes)).toBe("hello");
  });

  it("should return no bytes for a bodyless request", async () => {
    expect((await readBoundedBody(upload(), 16)).byteLength).toBe(0);
  });

  it("should stop reading past the limit", async () => {
    expect(await failure(() => readBoundedBody(upload("x".repeat(17)), 16))).toEqual([
      400,
      "Request too large.\n",
    ]);
  });
});

describe("readUpload", () => {
  it("should accept a body matching its Content-Length", async () => {
    const bytes = await readUpload(upload("hello"), "5", 16);

    expect(new TextDecoder().decode(bytes)).toBe("hello");
  });

  it("should require a Content-Length for a non-empty body", async () => {
    expect(await failure(() => readUpload(upload("hello"), undefined, 16))).toEqual([
      411,
      "Length required.\n",
    ]);
  });

  it("should accept an empty body without a Content-Length", async () => {
    expect((await readUpload(upload(), undefined, 16)).byteLength).toBe(0);
  });

  it("should reject a body that disagrees with its Content-Length", async () => {
    expect(await failure(() => readUpload(upload("hello"), "3", 16))).toEqual([
      400,
      "Bad request.\n",
    ]);
  });
});
