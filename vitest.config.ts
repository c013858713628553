import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["ld2410/**/*.test.ts"],
    environment: "node",
  },
});
