/**
 * Byte ranges
 *
 * `bytes=` only. Spans are served in header order, neither merged nor
 * deduplicated, and a span reaching past the value is not clamped: it makes
 * the whole request unsatisfiable.
 */

import parseRange from "range-parser";

export type ByteSpan = {
  start: number;
  /** Inclusive */
  end: number;
};

export type RangeOutcome =
  | { kind: "partial"; spans: ByteSpan[] }
  | { kind: "unsatisfiable" }
  | { kind: "invalid" };

const SPAN_PATTERN = /^\s*(\d*)-(\d*)\s*$/;

type SpanCheck = "ok" | "unsatisfiable" | "invalid";

const checkSpan = (spec: string, length: number): SpanCheck => {
  const match = SPAN_PATTERN.exec(spec);
  if (!match) return "invalid";
  const [, first = "", last = ""] = match;
  if (first === "" && last === "") return "invalid";

  if (first === "") {
    // suffix span: the last N bytes
    const suffix = Number(last);
    return suffix > 0 && suffix <= length ? "ok" : "unsatisfiable";
  }

  const start = Number(first);
  if (start >= length) return "unsatisfiable";
  if (last === "") return "ok";
  const end = Number(last);
  if (end >= length || end < start) return "unsatisfiable";
  return "ok";
};

/**
 * Evaluate a Range header against a value of `length` bytes
 */
export const evaluateRange = (header: string, length: number): RangeOutcome => {
  const ranges = parseRange(length, header, { combine: false });
  if (ranges === -2) return { kind: "invalid" };
  if (ranges !== -1 && ranges.type !== "bytes") return { kind: "invalid" };

  const unit = header.slice(0, header.indexOf("=")).trim();
  if (unit !== "bytes") return { kind: "invalid" };

  const specs = header.slice(header.indexOf("=") + 1).split(",");
  let unsatisfiable = false;
  for (const spec of specs) {
    const check = checkSpan(spec, length);
    if (check === "invalid") return { kind: "invalid" };
    if (check === "unsatisfiable") unsatisfiable = true;
  }
  if (unsatisfiable || ranges === -1) return { kind: "unsatisfiable" };

  return {
    kind: "partial",
    spans: ranges.map(({ start, end }) => ({ start, end })),
  };
};

/**
 * Concatenation of the spans, in order
 */
export const sliceSpans = (bytes: Uint8Array, spans: readonly ByteSpan[]): Uint8Array<ArrayBuffer> => {
  const total = spans.reduce((sum, span) => sum + span.end - span.start + 1, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const { start, end } of spans) {
    out.set(bytes.subarray(start, end + 1), offset);
    offset += end - start + 1;
  }
  return out;
};

export const contentRange = (span: ByteSpan, length: number): string =>
  `bytes ${span.start}-${span.end}/${length}`;

export const unsatisfiedRange = (length: number): string => `bytes */${length}`;
