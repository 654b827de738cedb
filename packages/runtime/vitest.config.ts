import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pickler/runtime",
    globals: true,
    environment: "node",
  },
});
