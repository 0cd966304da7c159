import path from "path";

import { defineConfig } from "vitest/config";

const alias = (dir: string): string => path.resolve(__dirname, "src", dir);

export default defineConfig({
  resolve: {
    alias: {
      "@app": alias("app"),
      "@config": alias("config"),
      "@domain": alias("domain"),
      "@infrastructure": alias("infrastructure"),
      "@interfaces": alias("interfaces"),
      "@middleware": alias("middleware"),
      "@routes": alias("routes"),
      "@typesLocal": alias("types"),
      "@utils": alias("utils"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "error",
      LOG_TO_FILE: "false",
    },
  },
});
