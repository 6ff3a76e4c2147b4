import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";
import dts from "vite-plugin-dts";

const srcDir = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  plugins: [
    dts({
      include: ["src/**/*.ts"],
    }),
  ],
  resolve: {
    alias: {
      '@': srcDir
    }
  },
  build: {
    lib: {
      entry: {
        index: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      },
      name: "QueuedLock",
      formats: ["es"],
      fileName: (format, entryName) => `${entryName}.js`,
    },
    emptyOutDir: true,
    outDir: "dist-lib",
    target: "node20",
  },
});
