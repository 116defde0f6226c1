import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@optarg/laws",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
