import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // clipanion 3 ships .mjs files with directory imports that Node's ESM
    // loader rejects; let Vite transform it instead.
    server: { deps: { inline: ["clipanion"] } },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/commands/run.ts",
        "src/daemon/lifecycle.ts",
        "src/config/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
