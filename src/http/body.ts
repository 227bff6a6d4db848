/**
 * Bounded request bodies
 *
 * Uploads are buffered whole before a transaction opens. The declared
 * Content-Length is checked up front; a body that keeps growing past the
 * limit is cut off while it streams in.
 */

import { httpError } from "../errors.ts";

export type WriteRequestHeaders = {
  contentLength: string | undefined;
  ifNoneMatch: string | undefined;
};

const parseContentLength = (value: string): number | null => {
  if (!/^\d+$/.test(value.trim())) return null;
  return Number(value.trim());
};

/**
 * Reject writes that can never succeed: oversized bodies and If-None-Match
 */
export const checkWriteHeaders = (headers: WriteRequestHeaders, maxBytes: number): void => {
  if (headers.contentLength !== undefined) {
    const length = parseContentLength(headers.contentLength);
    if (length === null) throw httpError(400, "Bad request.");
    if (length > maxBytes) throw httpError(400, "Request too large.");
  }
  if (headers.ifNoneMatch !== undefined) {
    throw httpError(412, "Precondition failed.");
  }
};

export const readBoundedBody = async (request: Request, maxBytes: number): Promise<Uint8Array> => {
  if (!request.body) return new Uint8Array(0);

  const reader = request.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw httpError(400, "Request too large.");
    }
    chunks.push(value);
  }

  const bytes = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
};

/**
 * Read an upload and hold it to its declared length
 *
 * A non-empty body needs a Content-Length (411), and the two must agree (400).
 */
export const readUpload = async (
  request: Request,
  contentLength: string | undefined,
  maxBytes: number
): Promise<Uint8Array> => {
  const bytes = await readBoundedBody(request, maxBytes);
  if (contentLength === undefined) {
    if (bytes.byteLength > 0) throw httpError(411, "Length required.");
    return bytes;
  }
  if (parseContentLength(contentLength) !== bytes.byteLength) {
    throw httpError(400, "Bad request.");
  }
  return bytes;
};
