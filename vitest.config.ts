import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "blame-porcelain",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    globals: true,
  },
});
