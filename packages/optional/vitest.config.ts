import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@optarg/optional",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
