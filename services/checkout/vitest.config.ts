import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "src/repositories/**/*Live.ts",
        "src/services/**/*.ts",
        "src/domain/**/*.ts",
        "src/api/**/*.ts",
        "src/main.ts"
      ],
      exclude: [
        "src/**/*.test.ts",
        "src/__tests__/**",
        "src/server.ts",
        "src/worker.ts",
        "src/db.ts",
        "src/layers.ts",
        "src/telemetry.ts"
      ]
    }
  }
})
