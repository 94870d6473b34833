import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@focal/construct",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
