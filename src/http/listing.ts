/**
 * Container listings
 *
 * The Accept header picks one of four representations by prefix match.
 * Anything unrecognised falls back to plain text.
 */

import type { Context } from "hono";
import { TEXT_PLAIN } from "../errors.ts";
import { renderListingPage } from "../templates/listing.ts";
import type { Env } from "../types.ts";

export type ListingFormat = "text" | "json" | "xml" | "html";

export const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>\n';

const JSON_TYPE = "application/json; charset=utf-8";
const XML_TYPE = "application/xml; charset=utf-8";

export const negotiateListing = (accept: string | undefined): ListingFormat => {
  const value = accept?.trim() ?? "";
  if (value.startsWith("application/json")) return "json";
  if (value.startsWith("application/xml")) return "xml";
  if (value.startsWith("text/html")) return "html";
  return "text";
};

export const xmlEscape = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&apos;");

export const formatText = (names: readonly string[]): string =>
  names.map((name) => `${name}\n`).join("");

export const formatJson = (names: readonly string[]): string => `${JSON.stringify(names)}\n`;

export const formatXml = (names: readonly string[]): string => {
  if (names.length === 0) return `${XML_HEADER}<bucket></bucket>`;
  const keys = names.map((name) => `  <key>${xmlEscape(name)}</key>`).join("\n");
  return `${XML_HEADER}<bucket>\n${keys}\n</bucket>`;
};

/**
 * Respond with the listing of a container at `path`
 */
export const respondWithListing = (
  c: Context<Env>,
  path: string,
  names: readonly string[]
): Response | Promise<Response> => {
  switch (negotiateListing(c.req.header("Accept"))) {
    case "json":
      return c.body(formatJson(names), 200, { "Content-Type": JSON_TYPE });
    case "xml":
      return c.body(formatXml(names), 200, { "Content-Type": XML_TYPE });
    case "html":
      return c.html(renderListingPage({ path, names, csrfToken: c.get("csrfToken") }));
    case "text":
      return c.body(formatText(names), 200, { "Content-Type": TEXT_PLAIN });
  }
};
