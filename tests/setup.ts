/**
 * Global test setup file
 * Runs before all tests
 */

import { vi, beforeEach, afterEach } from 'vitest';
import { configureLogger } from '../backend/logger';

// Keep test output readable; tests that assert on logging spy on the console directly
configureLogger({ level: 'error', dir: null });

// Reset any mocks between tests
beforeEach(() => {
    vi.clearAllMocks();
});

// Cleanup after each test
afterEach(() => {
    vi.restoreAllMocks();
});
