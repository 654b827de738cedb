import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pickler/derive",
    globals: true,
    environment: "node",
  },
});
