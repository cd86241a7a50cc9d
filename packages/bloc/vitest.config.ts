import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["tests/**/*.test.ts"],
    env: {
      // Keep bloc debug output out of test logs unless a test opts in.
      BLOC_LOG_LEVEL: "silent",
    },
  },
});
