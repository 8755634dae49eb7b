import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      CORE_VERBOSE: "0",
      VOICE_PROVIDER: "mock",
      VOICE_CACHE_ENABLED: "0",
    },
    testTimeout: 15000,
  },
});
