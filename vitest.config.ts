import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: ".",
    include: ["*/tests/**/*.test.ts"],
    globals: false,
    testTimeout: 10000,
  },
});
