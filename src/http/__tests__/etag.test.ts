/**
 * Tests for ETag fingerprints
 */

import { describe, expect, it } from "vitest";
import { createEtagProvider } from "../etag.ts";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("ETag provider", () => {
  it("should encode the big-endian xxh64 digest as padded base64", async () => {
    const { etag } = await createEtagProvider();

    // xxh64("") = 0xef46db3751d8e999
    expect(etag(new Uint8Array(0))).toBe("70bbN1HY6Zk=");
  });

  it("should be a function of the bytes alone", async () => {
    const first = await createEtagProvider();
    const second = await createEtagProvider();

    expect(first.etag(bytes("foobarbaz"))).toBe(second.etag(bytes("foobarbaz")));
    expect(first.etag(bytes("foobarbaz"))).not.toBe(first.etag(bytes("foobarbaz!")));
  });

  it("should always be twelve base64 characters", async () => {
    const { etag } = await createEtagProvider();

    for (const value of ["a", "hello world", "x".repeat(1000)]) {
      expect(etag(bytes(value))).toMatch(/^[A-Za-z0-9+/]{11}=$/);
    }
  });
});
