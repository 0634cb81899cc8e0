import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Exclude dist folder from test discovery
        exclude: [
            '**/node_modules/**',
            '**/dist/**',
            '**/.{idea,git,cache,output,temp}/**'
        ],
        // Only include TypeScript source files
        include: ['src/**/*.{test,spec}.ts'],
        environment: 'node',
        globals: true,
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent'
        }
    }
});
