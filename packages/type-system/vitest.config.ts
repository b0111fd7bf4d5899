import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hodata/type-system",
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
