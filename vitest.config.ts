import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    testTimeout: 60_000,
    hookTimeout: 60_000,
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@stacksmith/engine": packageSource("engine"),
      "@stacksmith/shared": packageSource("shared"),
    },
  },
});
