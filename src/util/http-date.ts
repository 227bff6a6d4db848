/**
 * RFC 1123 timestamps with a numeric zone, e.g. "Mon, 02 Jan 2006 15:04:05 +0000"
 */
export const formatLastModified = (date: Date): string =>
  date.toUTCString().replace(/ GMT$/, " +0000");
