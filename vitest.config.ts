import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["server/src/**/*.test.ts"],
    environment: "node",
    // The sampling path simulates a 16-qubit state vector per resolution.
    testTimeout: 30_000,
  },
});
