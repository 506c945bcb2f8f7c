import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  define: {
    __DEV__: "true",
  },
  resolve: {
    alias: [{ find: /^react-native$/, replacement: "react-native-web" }],
  },
  test: {
    environment: "jsdom",
    include: ["tests/**/*.test.ts", "tests/**/*.test.tsx"],
    setupFiles: ["tests/setup.ts"],
    env: {
      EXPO_PUBLIC_API_BASE_URL: "https://api.example.test",
      EXPO_PUBLIC_CLERK_PUBLISHABLE_KEY: "pk_test_placeholder",
    },
  },
});
