import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    testTimeout: 30000,
    hookTimeout: 60000,
    globals: true,
    include: ["src/**/*.{test,spec}.ts", "scripts/**/*.{test,spec}.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
})
