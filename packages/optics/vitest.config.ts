import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@focal/construct": fileURLToPath(new URL("../construct/src/index.ts", import.meta.url)),
    },
  },
  test: {
    name: "@focal/optics",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
