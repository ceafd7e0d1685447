import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@phaseflow/shared": packageEntry("shared"),
      "@phaseflow/core": packageEntry("core"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
