import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  cacheDir: path.join(os.tmpdir(), "storyreel-vite-cache"),
  resolve: {
    alias: {
      "@storyreel/shared": path.resolve(__dirname, "../../packages/shared/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    watch: false
  }
});
