import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['server/src/**/__tests__/**/*.test.ts'],
        testTimeout: 20_000,
        globals: false,
        pool: 'forks'
    }
});
