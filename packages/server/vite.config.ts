import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";

export default defineConfig({
  build: {
    ssr: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
    target: "node20",
    outDir: "dist",
    emptyOutDir: true,
    rollupOptions: {
      output: {
        format: "es",
        entryFileNames: "index.js"
      }
    },
    sourcemap: true
  },
  ssr: {
    // core ships TypeScript sources and JSON; bundle it rather than resolve at run time
    noExternal: ["@cocktail-aesthetics/core"]
  }
});
