import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Global test configuration
        globals: true,

        // Include patterns for test files
        include: ['tests/**/*.test.ts'],

        // Exclude patterns
        exclude: ['node_modules', 'dist', 'data'],

        // Coverage configuration
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            reportsDirectory: './coverage',
            include: ['backend/**/*.ts'],
            exclude: [
                'node_modules',
                'tests',
                '**/*.d.ts',
                'backend/main.ts'
            ]
        },

        // Setup files (run before tests)
        setupFiles: ['./tests/setup.ts'],

        environment: 'node',

        // better-sqlite3 is a native addon; forks keep each file in its own process
        pool: 'forks'
    }
});
