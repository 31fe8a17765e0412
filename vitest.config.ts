import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/src/**/__tests__/**/*.test.ts"],
    testTimeout: 10000
  }
});
