import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
    // Plain CLI output regardless of the terminal the tests run in.
    env: { NO_COLOR: "1" },
  },
});
