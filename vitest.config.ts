import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        setupFiles: ['src/testing/setup.ts'],
        testTimeout: 15_000,
    },
});
