import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["narration/**/__tests__/**/*.test.ts"],
    watch: false,
  },
});
