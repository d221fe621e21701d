import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const coreSrc = fileURLToPath(new URL("../core/src", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@cipherlicense\/core\/testkit$/, replacement: `${coreSrc}/testkit/index.ts` },
      { find: /^@cipherlicense\/core$/, replacement: `${coreSrc}/index.ts` },
    ],
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist", ".git"],
    pool: "threads",
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});
