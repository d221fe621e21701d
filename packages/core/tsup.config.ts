import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/testkit/index.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  // Native addon and its dynamic requires stay external
  external: ["better-sqlite3", "tweetnacl"],
});
