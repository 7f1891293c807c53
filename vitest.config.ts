import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "~": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    isolate: true,
    reporters: process.env.GITHUB_ACTIONS
      ? ["github-actions", "default"]
      : ["default"],
    include: ["src/__tests__/**/*.test.ts"],
    exclude: ["**/*.d.ts", "node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json"],
      include: ["src/**/*.ts"],
      exclude: ["src/server.ts", "src/__tests__/**"],
    },
  },
});
