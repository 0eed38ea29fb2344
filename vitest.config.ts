import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["busprobe/**/*.test.ts"],
  },
});
