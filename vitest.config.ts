import path from "node:path";
import {defineConfig} from "vitest/config";
const __dirname = new URL(".", import.meta.url).pathname;

export default defineConfig({
  test: {
    pool: "threads",
    dir: "packages",
    include: ["**/test/unit/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/.{idea,git,cache,output,temp}/**"],
    setupFiles: [path.join(__dirname, "./scripts/vitest/customMatchers.ts")],
    reporters: ["default"],
    coverage: {
      enabled: process.env.CI === "true",
      clean: true,
      all: false,
      extension: [".ts"],
      provider: "v8",
      reporter: [["lcovonly", {file: "lcov.info"}], ["text"]],
      reportsDirectory: "./coverage",
      exclude: ["**/*.d.ts", "**/coverage/**", "**/scripts/**", "**/test/**", "**/types/**", "**/node_modules/**"],
    },
  },
});
