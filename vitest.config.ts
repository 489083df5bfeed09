import { defineConfig } from "vitest/config";

export default defineConfig({
  define: {
    __APP_VERSION__: JSON.stringify("dev"),
  },
  test: {
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
