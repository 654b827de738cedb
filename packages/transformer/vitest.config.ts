import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pickler/transformer",
    globals: true,
    environment: "node",
  },
});
