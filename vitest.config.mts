import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["velocity-report/src/**/*.test.ts"],
    environment: "node"
  }
});
