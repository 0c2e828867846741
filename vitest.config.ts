import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@bindelta/hash": fileURLToPath(new URL("./packages/hash/src/index.ts", import.meta.url)),
      "@bindelta/delta": fileURLToPath(new URL("./packages/delta/src/index.ts", import.meta.url)),
    },
  },
});
