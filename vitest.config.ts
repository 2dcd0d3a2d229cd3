import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.test.ts"],
        // ts-morph builds a program on first use
        testTimeout: 30_000,
    },
});
