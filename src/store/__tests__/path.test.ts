/**
 * Tests for path resolution
 */

import { describe, expect, it } from "vitest";
import {
  canonicalPath,
  escapedPath,
  lastSegment,
  parentSegments,
  splitPath,
} from "../path.ts";

describe("splitPath", () => {
  it("should lead with the root segment", () => {
    expect(splitPath("/")).toEqual(["/"]);
    expect(splitPath("")).toEqual(["/"]);
  });

  it("should split on slashes and drop empty components", () => {
    expect(splitPath("/foo/bar")).toEqual(["/", "foo", "bar"]);
    expect(splitPath("//foo///bar/")).toEqual(["/", "foo", "bar"]);
  });

  it("should keep escaped slashes inside one segment", () => {
    expect(splitPath("/a%2Fb/c")).toEqual(["/", "a%2Fb", "c"]);
  });
});

describe("escapedPath", () => {
  it("should keep percent escapes and drop the query string", () => {
    expect(escapedPath("http://localhost/a%2Fb/c%20d?x=1")).toBe("/a%2Fb/c%20d");
  });
});

describe("canonicalPath", () => {
  it("should give one spelling per node", () => {
    expect(canonicalPath(splitPath("/a//b/"))).toBe("/a/b");
    expect(canonicalPath(splitPath("/a/b"))).toBe("/a/b");
    expect(canonicalPath(splitPath("/"))).toBe("/");
  });
});

describe("parentSegments", () => {
  it("should drop the last segment", () => {
    expect(parentSegments(["/", "a", "b"])).toEqual(["/", "a"]);
    expect(parentSegments(["/", "a"])).toEqual(["/"]);
  });

  it("should treat the root as its own parent", () => {
    expect(parentSegments(["/"])).toEqual(["/"]);
  });
});

describe("lastSegment", () => {
  it("should return the final segment", () => {
    expect(lastSegment(["/", "a", "b"])).toBe("b");
    expect(lastSegment(["/"])).toBe("/");
  });
});
