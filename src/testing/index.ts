/**
 * Testing utilities
 */

export {
  type CreateTestAppOptions,
  createTestApp,
  createTestConfig,
  type RequestOptions,
  TEST_LAST_MODIFIED,
  TEST_NOW,
  type TestApp,
  type TestConfigOverrides,
  type TestHelpers,
} from "./test-app.ts";
