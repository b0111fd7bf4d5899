import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hodata/ho",
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
