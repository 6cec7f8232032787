import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/src/**/*.test.ts", "frontend/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    setupFiles: ["./vitest.setup.ts"]
  }
});
