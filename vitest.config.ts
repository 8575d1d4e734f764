import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@guidstore/core": packageSource("core"),
      "@guidstore/config": packageSource("config"),
      "@guidstore/store-archive": packageSource("store-archive"),
      "@guidstore/store-files": packageSource("store-files"),
      "@guidstore/storage-tests": packageSource("storage-tests"),
      "@guidstore/utils": packageSource("utils"),
    },
  },
});
