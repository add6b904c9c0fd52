import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["sources/**/*.spec.ts"],
        testTimeout: 10_000,
        hookTimeout: 10_000
    }
});
