import { defineConfig, defineProject } from "vitest/config";
import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    exclude: defaultExclude,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json"],
      reportsDirectory: "coverage",
    },
    projects: [
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "core",
          include: ["packages/core/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "cli",
          include: ["packages/cli/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
          server: {
            deps: {
              inline: [/@gdoc-editor\/.*/],
            },
          },
        },
      }),
    ],
  },
});
