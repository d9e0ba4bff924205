import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    alias: {
      "@countme/logger": pkg("logger"),
      "@countme/core": pkg("core"),
      "@countme/repos": pkg("repos"),
      "@countme/cookie": pkg("cookie"),
      "@countme/host": pkg("host"),
      "@countme/reporter": pkg("reporter"),
    },
  },
});
