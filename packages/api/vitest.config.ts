import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    // Disable watch mode by default (use --watch flag to enable)
    watch: false,

    // Global test setup
    globals: true,

    // Coverage configuration
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html", "lcov"],
      exclude: [
        "**/__tests__/**",
        "**/*.test.ts",
        // Test utilities
        "**/test/**",
        // Process entry points
        "**/cli/feedseeker.ts",
        "**/entries/**",
        "**/*.config.*",
        "**/node_modules/**",
      ],
    },

    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],

    testTimeout: 10000,
  },

  // Path resolution - match tsconfig.json
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
});
