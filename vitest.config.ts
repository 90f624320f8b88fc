import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': new URL('./src', import.meta.url).pathname,
            '~types': new URL('./src/types', import.meta.url).pathname,
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        reporters: ['default'],
    },
});
