import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (dir: string): string =>
  fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": fromRoot("app"),
      "@config": fromRoot("config"),
      "@domain": fromRoot("domain"),
      "@infrastructure": fromRoot("infrastructure"),
      "@interfaces": fromRoot("interfaces"),
      "@middleware": fromRoot("middleware"),
      "@routes": fromRoot("routes"),
      "@typesLocal": fromRoot("types"),
      "@utils": fromRoot("utils"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      STORE_DRIVER: "memory",
      OPENAI_API_KEY: "",
    },
  },
});
