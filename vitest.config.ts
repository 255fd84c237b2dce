import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["exporter/**/*.test.ts"],
    environment: "node",
  },
});
