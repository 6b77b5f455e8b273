import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqkit/sequences",
    globals: true,
    environment: "node",
  },
});
