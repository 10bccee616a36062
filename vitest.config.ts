import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 15_000,
  },
  resolve: {
    alias: {
      "@agenda/types": pkg("types"),
      "@agenda/core": pkg("core"),
      "@agenda/persistence": pkg("persistence"),
      "@agenda/runtime": pkg("runtime"),
      "@agenda/tools": pkg("tools"),
      "@agenda/gateway": pkg("gateway"),
    },
  },
});
