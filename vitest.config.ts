import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "hono/jsx",
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.{ts,tsx}"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
    clearMocks: true,
    unstubGlobals: true,
  },
});
