import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    // The CLI tests spawn the hook through tsx.
    testTimeout: 30_000,
  },
});
