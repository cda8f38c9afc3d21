import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["spec/**/*.spec.ts"],
    environment: "node",
    restoreMocks: true,
    unstubGlobals: true,
  },
});
