import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov", "json-summary"],
    },
    // Workspace packages resolve to their TypeScript sources
    alias: {
      "@treekit/paths": fileURLToPath(new URL("./packages/paths/src/index.ts", import.meta.url)),
      "@treekit/fs": fileURLToPath(new URL("./packages/fs/src/index.ts", import.meta.url)),
    },
  },
});
