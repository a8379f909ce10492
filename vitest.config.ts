import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
      "@test": fileURLToPath(new URL("./test", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    hookTimeout: 30000,
    include: ["test/**/*.test.ts", "src/**/*.test.ts"],
    coverage: {
      include: ["src/**/*.ts"],
      exclude: [
        // Type definitions only
        "src/types/**",

        "**/*.test.ts",
        "**/test/**",
        "**/*.config.ts",
        "dist/**",
        "**/node_modules/**",
      ],
    },
  },
});
