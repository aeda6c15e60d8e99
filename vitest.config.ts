import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/cluster/types.ts",
        "src/dns/types.ts",
        // Process entrypoint: wiring only
        "src/index.ts",
      ],
    },
  },
});
