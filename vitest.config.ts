import { defineConfig } from "vitest/config";
import os from "os";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    passWithNoTests: false,
    env: {
      SLOTWATCH_LOG_DIR: path.join(os.tmpdir(), "slotwatch-test-logs")
    }
  }
});
