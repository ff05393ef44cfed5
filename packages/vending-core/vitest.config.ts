import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vending/core",
    environment: "node",
    include: [
      "tests/unit/**/*.test.ts",
      "tests/steps/**/*.steps.ts", // Gherkin step files
    ],
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
