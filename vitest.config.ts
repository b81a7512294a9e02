import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.{test,spec}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // scrypt-backed keystores make some wallet tests slower than the default allows
    testTimeout: 30000,
  },
});
