import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const packagesDir = fileURLToPath(new URL("..", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@cipherlicense\/core\/testkit$/, replacement: `${packagesDir}core/src/testkit/index.ts` },
      { find: /^@cipherlicense\/core$/, replacement: `${packagesDir}core/src/index.ts` },
      { find: /^@cipherlicense\/oracle-bridge$/, replacement: `${packagesDir}oracle-bridge/src/index.ts` },
    ],
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist", ".git"],
    pool: "threads",
    testTimeout: 30_000,
  },
});
