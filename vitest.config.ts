import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    env: {
      // Keep the depth guard at its default regardless of the caller's shell.
      EEGCONF_MAX_INCLUDE_DEPTH: "",
    },
  },
});
