import { config } from "dotenv";
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

// Load .env.local before any test file runs
config({ path: ".env.local" });

export default defineConfig({
  plugins: [tsconfigPaths()],
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "react",
  },
  test: {
    environment: "node",
    globals: true,
    setupFiles: ["./__tests__/setup.ts"],
    include: ["__tests__/**/*.test.ts", "__tests__/**/*.test.tsx"],
    env: {
      BCRYPT_ROUNDS: "4",
      CTF_ENABLED: "true",
      SHUTTERBUG_DATA_DIR: ".test-data",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
    },
  },
});
