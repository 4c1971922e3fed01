import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cadence-main/tests/**/*.test.ts", "cadence-cli/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
