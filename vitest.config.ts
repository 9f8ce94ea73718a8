import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "extensions/*/*.test.ts", "extensions/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
    unstubGlobals: true,
  },
});
