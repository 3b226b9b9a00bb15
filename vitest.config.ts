import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    env: { NO_COLOR: "1" },
  },
});
