import { defineConfig } from "vitest/config";

export default defineConfig({
   test: {
      environment: "node",
      include: ["tests/**/*.test.ts"],
      exclude: ["node_modules", "dist"],
      coverage: {
         provider: "v8",
         reporter: ["text", "json", "html"],
         include: ["src/**/*.ts"],
         exclude: ["src/**/index.ts", "src/cli/cli.ts"],
      },
      testTimeout: 10000,
   },
});
