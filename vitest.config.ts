import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@testbridge/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url)
      ),
    },
  },
});
