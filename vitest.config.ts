import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(root, "shared"),
    },
  },
  test: {
    environment: "node",
    include: ["scripts/**/__tests__/**/*.test.ts", "server/**/__tests__/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**", "data/**"],
  },
});
