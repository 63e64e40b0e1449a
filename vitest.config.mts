import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // xlsx has no "exports" map; its ESM build is only named by "module"
    mainFields: ["module", "main"],
  },
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    testTimeout: 20000,
    server: {
      deps: {
        // Load the ESM build of xlsx (xlsx.mjs), which exports set_fs
        inline: ["xlsx"],
      },
    },
  },
});
