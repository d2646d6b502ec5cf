// /vitest.config.mts (workspace root)
import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@shared": path.resolve(root, "backend/services/shared/src"),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/shared/test/**/*.spec.ts",
      "backend/services/course/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/course/test/setup.ts"],
    globals: true,
    hookTimeout: 20_000,
    testTimeout: 20_000,
  },
});
