import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqkit/core",
    globals: true,
    environment: "node",
  },
});
