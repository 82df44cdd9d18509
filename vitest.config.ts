import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["redeployctl/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 30000,
  },
});
