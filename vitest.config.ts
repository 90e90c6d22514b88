import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    dedupe: ["graphql"],
  },
  test: {
    coverage: {
      exclude: ["dist", "examples", "node_modules", "**/*.d.ts"],
      provider: "v8",
      reporter: ["html", "json", "text"],
    },
    environment: "node",
    exclude: ["**/dist/**", "**/node_modules/**"],
    globals: true,
    include: ["src/**/*.test.ts"],
    server: {
      deps: {
        inline: ["graphql"],
      },
    },
  },
});
