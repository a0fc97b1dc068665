import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov", "json-summary"],
    },
    // Resolve workspace packages to their sources so tests need no build.
    alias: {
      "@ndk-graph/shared": packageEntry("shared"),
      "@ndk-graph/toolchain": packageEntry("toolchain"),
      "@ndk-graph/cc": packageEntry("cc"),
    },
  },
});
