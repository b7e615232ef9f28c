import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // The default logger and the diagnostics bus are process-wide
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
