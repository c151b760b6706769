import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  test: {
    name: "client",
    environment: "jsdom",
    // styles.test.ts reads styles.css?raw, which is empty unless CSS is processed
    css: true,
    include: ["src/**/*.test.{ts,tsx}"],
    // Testing Library only auto-cleans when test globals are enabled
    setupFiles: ["./src/test/setup.ts"],
  },
});
