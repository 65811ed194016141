import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/**/__tests__/**/*.test.ts", "packages/**/__tests__/**/*.test.ts"],
    restoreMocks: true
  }
});
