import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` runs every colocated `__tests__` suite across apps and packages
 * in one pass. Tests never reach the network: the TronGrid client is exercised
 * against a mocked axios instance and the sampler against a fake fetcher.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent'
        }
    }
});
