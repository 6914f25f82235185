import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/__tests__/**/*.test.ts"],
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      reporter: ["text", "text-summary"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/__tests__/**", "packages/provisioner/src/bin.ts"],
    },
  },
});
