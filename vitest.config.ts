import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: "@verbgate/sdk", replacement: src("./packages/sdk/src/index.ts") },
      { find: "@verbgate/shared/testing", replacement: src("./packages/shared/src/testing/index.ts") },
      { find: "@verbgate/shared", replacement: src("./packages/shared/src/index.ts") },
      { find: "@verbgate/core", replacement: src("./packages/core/src/index.ts") },
    ],
  },
});
