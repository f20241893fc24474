import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['engine/src/**/*.test.ts', 'tests/**/*.test.ts'],
        testTimeout: 15_000,
        hookTimeout: 10_000,
    },
});
