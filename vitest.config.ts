import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const resolveWorkspacePath = (relativePath: string) => path.resolve(__dirname, relativePath);

export default defineConfig({
  test: {
    environment: "node",
    include: ["drivers/*/tests/**/*.test.ts", "services/*/tests/**/*.test.ts"]
  },
  resolve: {
    alias: {
      "@devbridge/driver-core": resolveWorkspacePath("drivers/core/src/index.ts"),
      "@devbridge/driver-fake": resolveWorkspacePath("drivers/fake/src/index.ts"),
      "@devbridge/driver-tcp-line": resolveWorkspacePath("drivers/tcp-line/src/index.ts"),
      "@devbridge/driver-bridge": resolveWorkspacePath("services/driver-bridge/src/index.ts")
    }
  }
});
