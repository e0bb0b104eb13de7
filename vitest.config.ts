import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Tests share the working directory for their cache folders
    fileParallelism: false,
  },
});
