import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        // Timeouts to prevent hung processes
        testTimeout: 10000,
        hookTimeout: 10000,
        teardownTimeout: 5000,
    },
});
