import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        pool: 'forks',
        maxWorkers: 4,
        // task.ts exports a function named `then`, which makes its module
        // namespace a thenable that never settles when awaited by Vite's
        // module runner. Load modules with Node's native import instead,
        // transpiled by tsx.
        execArgv: ['--import', 'tsx'],
        experimental: {
            viteModuleRunner: false,
            nodeLoader: false,
        },
        // Timeouts to prevent hung processes
        testTimeout: 10000,
        hookTimeout: 10000,
        teardownTimeout: 5000,
    },
});
