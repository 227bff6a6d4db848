/**
 * ETag fingerprints
 *
 * base64(xxh64(bytes)) with the 64-bit digest written big-endian, e.g.
 * "3kv7nX1cX2E=". Purely a function of the bytes.
 */

import xxhash from "xxhash-wasm";
import type { EtagProvider } from "../types.ts";

let hasherPromise: ReturnType<typeof xxhash> | null = null;

const getHasher = async () => {
  if (!hasherPromise) {
    hasherPromise = xxhash();
  }
  return hasherPromise;
};

const base64FromBigInt = (value: bigint): string => {
  const bytes = Buffer.alloc(8);
  bytes.writeBigUInt64BE(value);
  return bytes.toString("base64");
};

export const createEtagProvider = async (): Promise<EtagProvider> => {
  const { h64Raw } = await getHasher();
  return {
    etag: (bytes) => base64FromBigInt(h64Raw(bytes)),
  };
};
