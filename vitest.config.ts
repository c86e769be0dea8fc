import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

function workspaceEntry(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

// Workspace packages export their built `dist/` at runtime; tests run
// against the TypeScript sources instead.
export default defineConfig({
  resolve: {
    alias: {
      "@jsonassay/core": workspaceEntry("core"),
      "@jsonassay/json-diff": workspaceEntry("json-diff"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
  },
});
