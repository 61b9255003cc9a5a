import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/**/*.test.ts", "local-agent/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
