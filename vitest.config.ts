import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['opendata/**/*.test.ts'],
        unstubEnvs: true,
    },
});
