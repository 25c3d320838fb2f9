import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@shelflight\/core$/, replacement: source("./core/src/index.ts") },
      { find: /^@shelflight\/gateway$/, replacement: source("./gateway/src/index.ts") },
      { find: /^@shelflight\/gateway\/testing$/, replacement: source("./gateway/src/testing/fake-broker.ts") },
    ],
  },
  test: {
    include: ["core/src/**/*.test.ts", "gateway/src/**/*.test.ts", "server/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
