import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@kwargs-kit/keywords",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
