import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    env: {
      LOG_LEVEL: "silent",
      NO_COLOR: "1",
    },
  },
});
