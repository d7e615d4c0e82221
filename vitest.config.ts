import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const dirname = path.dirname(fileURLToPath(import.meta.url));

const resolveFromRoot = (...segments: string[]) =>
  path.resolve(dirname, ...segments);

export default defineConfig({
  resolve: {
    alias: {
      "@termtrace/utils": resolveFromRoot("packages/utils/src/index.ts"),
      "@termtrace/trace-schema": resolveFromRoot("packages/trace-schema/src/index.ts"),
      "@termtrace/hash-registry": resolveFromRoot("packages/hash-registry/src/index.ts"),
      "@termtrace/session-recorder": resolveFromRoot("packages/session-recorder/src/index.ts"),
      "@termtrace/session-driver": resolveFromRoot("packages/session-driver/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
