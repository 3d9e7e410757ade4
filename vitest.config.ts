import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["app/extensions/healthbud/tests/**/*.test.ts"],
  },
});
