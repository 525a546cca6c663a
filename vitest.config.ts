// vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["backend/services/**/test/**/*.spec.ts"],
    env: { NODE_ENV: "test", LOG_LEVEL: "silent" },
    testTimeout: 10_000,
  },
});
