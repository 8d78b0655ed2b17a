import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/src/**/*.test.ts", "scripts/**/*.test.ts"],
    environment: "node",
  },
});
