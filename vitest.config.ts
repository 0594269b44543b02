import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "contracts/src/**/*.test.ts",
      "control/src/**/*.test.ts",
      "control/tests/**/*.test.ts",
    ],
    setupFiles: ["control/tests/setup-quiet.ts"],
  },
});
