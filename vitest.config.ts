import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["CatalogService/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
