import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    hookTimeout: 30000,
    // Package exports point at built output; tests run against the sources.
    alias: {
      "@polyglot-bridge/core": source("./packages/core/src/index.ts"),
      "@polyglot-bridge/language-server/api": source("./packages/language-server/src/api.ts"),
    },
  },
});
