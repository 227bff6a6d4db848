/**
 * Path resolution
 *
 * A request path becomes an ordered list of escaped segments, always led by
 * the synthetic root segment "/". Segments stay percent-escaped, so an
 * encoded slash (%2F) never splits a segment.
 */

export const ROOT_SEGMENT = "/";

/**
 * Escaped path of a request URL (query string excluded)
 */
export const escapedPath = (url: string): string => new URL(url).pathname;

export const splitPath = (path: string): string[] => {
  const segments = [ROOT_SEGMENT];
  for (const part of path.split("/")) {
    if (part.length > 0) segments.push(part);
  }
  return segments;
};

/**
 * Single spelling of a path: `/a//b/` and `/a/b` both become `/a/b`
 */
export const canonicalPath = (segments: readonly string[]): string =>
  ROOT_SEGMENT + segments.slice(1).join("/");

/**
 * Segments of the enclosing container; the root encloses itself
 */
export const parentSegments = (segments: readonly string[]): string[] =>
  segments.length > 1 ? segments.slice(0, -1) : [...segments];

export const lastSegment = (segments: readonly string[]): string =>
  segments[segments.length - 1] ?? ROOT_SEGMENT;
