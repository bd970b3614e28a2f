import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    resolve: {
        alias: {
            '@src': fileURLToPath(new URL('./src', import.meta.url)),
            '@lib': fileURLToPath(new URL('./src/lib', import.meta.url)),
            '@spec': fileURLToPath(new URL('./spec', import.meta.url))
        }
    },
    test: {
        include: ['spec/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10000
    }
});
