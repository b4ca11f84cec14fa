import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/run.ts'],
        },
    },
    resolve: {
        alias: {
            '@ffmeter/cli': resolve('./packages/cli/src/index.ts'),
            '@ffmeter/progress': resolve('./packages/progress/src/index.ts'),
            '@ffmeter/supervisor': resolve('./packages/supervisor/src/index.ts'),
            '@ffmeter/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
