import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // The engine's package main is its build output; tests run the sources
      "@desktop-repack/engine": path.resolve(__dirname, "engine/src/index.ts"),
    },
  },
  test: {
    include: ["engine/tests/**/*.test.ts", "cli/tests/**/*.test.ts"],
    testTimeout: 20_000,
  },
});
