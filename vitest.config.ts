import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts", "e2e/**/*.test.ts"],
    reporters: ["default"],
  },
});
