import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["sources/**/*.spec.ts"],
        testTimeout: 30_000
    }
});
