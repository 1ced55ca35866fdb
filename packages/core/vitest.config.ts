import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@kwargs-kit/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
