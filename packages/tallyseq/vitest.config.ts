import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "tallyseq",
    globals: true,
    environment: "node",
  },
});
