import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every workspace's colocated tests with this config.
 * Individual workspaces can still run on their own with their own vitest.config.ts.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',    // Colocated tests in apps
            'packages/**/src/**/__tests__/**/*.test.ts' // Colocated tests in packages
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        // Default env vars for all tests (individual workspaces can override)
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent',
            ENABLE_BLOCK_LOG: 'false'
        }
    }
});
