import { defineConfig } from "vitest/config";

export default defineConfig({
  // Keep the repo-root `.env` out of test runs so mode resolution stays deterministic.
  envDir: "src",
  test: {
    globals: false,
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 30000
  }
});
