import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pickler/core",
    globals: true,
    environment: "node",
  },
});
