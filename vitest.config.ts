import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Tracing initialization reads OTEL_* at import time
    env: {
      OTEL_TRACING_ENABLED: "false",
    },
  },
});
