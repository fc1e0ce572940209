import { defineConfig } from 'vitest/config';
import { fileURLToPath, URL } from 'node:url';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        setupFiles: ['tests/setup.ts'],
        include: ['tests/**/*.test.ts'],
        exclude: [
            'node_modules/**/*',
            'dist/**/*',
        ],
        testTimeout: 30000,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: [
                'dist/**/*',
                'node_modules/**/*',
                'tests/**/*',
                // Thin wrappers over ffmpeg and the process entry point
                'src/util/media.ts',
                'src/main.ts',
            ],
            thresholds: {
                lines: 70,
                statements: 70,
                branches: 60,
                functions: 70,
            },
        },
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
