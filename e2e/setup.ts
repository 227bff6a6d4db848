/**
 * E2E Test Setup
 *
 * Shared setup and utilities for e2e tests. Every suite runs in process
 * against both engines; the sqlite engine uses an in-memory database.
 */

import { createMemoryEngine, createSqliteEngine, type KvEngine } from "../src/engine/index.ts";
import { type CreateTestAppOptions, createTestApp, type TestApp } from "../src/testing/index.ts";

// ============================================================================
// Engines
// ============================================================================

export type EngineCase = [name: string, createEngine: () => KvEngine];

export const ENGINES: EngineCase[] = [
  ["memory", () => createMemoryEngine()],
  ["sqlite", () => createSqliteEngine({ path: ":memory:" })],
];

// ============================================================================
// Context
// ============================================================================

export type E2EContext = TestApp & {
  cleanup: () => void;
};

export const createE2EContext = async (
  createEngine: () => KvEngine,
  options: Omit<CreateTestAppOptions, "engine"> = {}
): Promise<E2EContext> => {
  const engine = createEngine();
  const app = await createTestApp({ ...options, engine });
  return { ...app, cleanup: () => engine.close() };
};

// ============================================================================
// Helpers
// ============================================================================

export const bytes = (value: string): Uint8Array => new TextEncoder().encode(value);
