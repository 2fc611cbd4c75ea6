import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages load from source, including for modules generated into temp directories.
    alias: {
      "@scenecast/codegen": source("codegen"),
      "@scenecast/scene": source("scene"),
      "@scenecast/cli": source("cli"),
    },
  },
  test: {
    environment: "node",
    testTimeout: 10_000,
    restoreMocks: true,
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
  },
});
