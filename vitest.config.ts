import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const root = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

// Subpaths are listed before their parent packages
const aliases = [
  {
    find: "@loopwright/engine-telemetry/logging",
    replacement: root("./packages/engine-telemetry/src/logging/index.ts"),
  },
  {
    find: "@loopwright/engine-telemetry",
    replacement: root("./packages/engine-telemetry/src/index.ts"),
  },
  {
    find: "@loopwright/engine-core",
    replacement: root("./packages/engine-core/src/index.ts"),
  },
  {
    find: "@loopwright/engine-execution",
    replacement: root("./packages/engine-execution/src/index.ts"),
  },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
