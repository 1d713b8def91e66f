import { defineConfig } from "vitest/config";

/**
 * Unit tests only: OCR subprocesses, PDF libraries and the generation
 * backend are replaced by in-process fakes inside each test file.
 */
export default defineConfig({
    test: {
        environment: "node",
        include: ["src/**/*.test.ts"],
        testTimeout: 30000,
        restoreMocks: true,
    },
});
