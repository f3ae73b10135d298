import { defineConfig } from "vite";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

// Workspace packages are consumed from source; these mirror the tsconfig paths.
export default defineConfig({
  resolve: {
    alias: {
      "@keel/lib": resolve(packagesRoot, "lib/src/lib"),
      "@keel/compiler": resolve(packagesRoot, "compiler/src"),
    },
  },
});
