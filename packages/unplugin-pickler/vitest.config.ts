import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "unplugin-pickler",
    globals: true,
    environment: "node",
  },
});
