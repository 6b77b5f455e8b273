import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqkit/collections",
    globals: true,
    environment: "node",
  },
});
