import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["settlement/src/**/*.test.ts", "scripts/bids/**/*.test.ts"],
    environment: "node",
  },
});
