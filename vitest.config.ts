import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
    watch: false,
  },
});
