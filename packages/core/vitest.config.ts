import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hodata/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
