import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";
import dts from "vite-plugin-dts";

export default defineConfig({
    build: {
        lib: {
            entry: fileURLToPath(new URL("src/index.ts", import.meta.url)),
            name: "SliceRuns",
            fileName: "index",
        },
        rollupOptions: {
            external: ["lodash-es"],
            output: {
                globals: {
                    "lodash-es": "_",
                },
            },
        },
    },
    plugins: [dts({ rollupTypes: true, include: ["src"] })],
});
