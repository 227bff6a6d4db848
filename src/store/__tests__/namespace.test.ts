/**
 * Tests for namespace navigation
 */

import { HTTPException } from "hono/http-exception";
import { beforeEach, describe, expect, it } from "vitest";
import { createMemoryEngine, type KvEngine } from "../../engine/index.ts";
import { ConsistencyError } from "../../errors.ts";
import {
  getOrCreateContainerChain,
  listNames,
  resolveContainer,
  resolveContainerOrValue,
} from "../namespace.ts";
import { ROOT_SEGMENT } from "../path.ts";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("Namespace Navigator", () => {
  let engine: KvEngine;

  beforeEach(() => {
    engine = createMemoryEngine();
    engine.update((tx) => {
      const root = tx.createBucketIfNotExists(ROOT_SEGMENT);
      const a = root.createBucketIfNotExists("a");
      a.put("value", bytes("v"));
      a.createBucketIfNotExists("b");
    });
  });

  describe("resolveContainer", () => {
    it("should resolve the root", () => {
      const names = engine.view((tx) => {
        const root = resolveContainer(tx, ["/"]);
        return root ? listNames(root) : null;
      });

      expect(names).toEqual(["a"]);
    });

    it("should walk nested containers", () => {
      expect(engine.view((tx) => resolveContainer(tx, ["/", "a", "b"]) !== null)).toBe(true);
    });

    it("should return null when a segment is missing", () => {
      expect(engine.view((tx) => resolveContainer(tx, ["/", "missing", "b"]))).toBeNull();
    });

    it("should return null when a segment is a value", () => {
      expect(engine.view((tx) => resolveContainer(tx, ["/", "a", "value"]))).toBeNull();
    });

    it("should treat a missing root as a consistency fault", () => {
      const bare = createMemoryEngine();

      expect(() => bare.view((tx) => resolveContainer(tx, ["/"]))).toThrow(ConsistencyError);
    });
  });

  describe("resolveContainerOrValue", () => {
    it("should tell containers and values apart", () => {
      const kinds = engine.view((tx) => {
        const a = resolveContainer(tx, ["/", "a"]);
        if (!a) return null;
        return ["b", "value", "missing"].map((name) => resolveContainerOrValue(a, name)?.kind ?? null);
      });

      expect(kinds).toEqual(["container", "value", null]);
    });

    it("should return the stored bytes of a value", () => {
      const value = engine.view((tx) => {
        const a = resolveContainer(tx, ["/", "a"]);
        const node = a ? resolveContainerOrValue(a, "value") : null;
        return node?.kind === "value" ? new TextDecoder().decode(node.bytes) : null;
      });

      expect(value).toBe("v");
    });
  });

  describe("getOrCreateContainerChain", () => {
    it("should create every missing container", () => {
      engine.update((tx) => getOrCreateContainerChain(tx, ["/", "x", "y", "z"]));

      expect(engine.view((tx) => resolveContainer(tx, ["/", "x", "y", "z"]) !== null)).toBe(true);
    });

    it("should reuse existing containers", () => {
      engine.update((tx) => getOrCreateContainerChain(tx, ["/", "a", "b"]));

      const names = engine.view((tx) => {
        const a = resolveContainer(tx, ["/", "a"]);
        return a ? listNames(a) : null;
      });
      expect(names).toEqual(["b", "value"]);
    });

    it("should reject a chain running through a value", () => {
      let status: number | null = null;
      try {
        engine.update((tx) => getOrCreateContainerChain(tx, ["/", "a", "value", "c"]));
      } catch (err) {
        if (err instanceof HTTPException) status = err.status;
      }

      expect(status).toBe(400);
    });
  });
});
