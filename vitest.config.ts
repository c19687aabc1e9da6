import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            // Workspace aliases so tests run against package sources without a build
            '@chartvault/core/test-utils': root('./packages/core/src/logger/test-utils.ts'),
            '@chartvault/core': root('./packages/core/src/index.ts'),
            '@chartvault/storage': root('./packages/storage/src/index.ts'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        watch: false,
    },
});
