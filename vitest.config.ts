import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/inboxforge/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
        },
        testTimeout: 10_000,
    },
});
