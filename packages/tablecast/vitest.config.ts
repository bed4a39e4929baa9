import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        // Entry points - exercised through the generate tests
        "src/cli.ts",
        "src/index.ts",
        "**/*.test.ts",
      ],
    },
  },
});
