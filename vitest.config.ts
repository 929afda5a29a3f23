import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@wordclass/shared": pkg("shared"),
      "@wordclass/core": pkg("core"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      NO_COLOR: "1", // Plain severity tags in tests for consistent assertions
    },
  },
});
