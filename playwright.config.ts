import { defineConfig } from "@playwright/test";

export default defineConfig({
  testDir: "./tests/unit",
  testMatch: "**/*.test.ts",
  /* Pure timeline math: no browser, no dev server */
  fullyParallel: true,
});
