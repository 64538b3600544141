import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.unit.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
    pool: "forks",
  },
});
