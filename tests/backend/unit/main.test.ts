/**
 * CLI entry point Unit Tests
 */

import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';

vi.mock('dotenv', () => ({
    default: { config: vi.fn() }
}));

import { run } from '../../../backend/main';

describe('run', () => {
    let logSpy: MockInstance;
    let errorSpy: MockInstance;

    beforeEach(() => {
        logSpy = vi.spyOn(console, 'log').mockImplementation(() => { });
        errorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    it('should print usage and succeed without a command', async () => {
        expect(await run([])).toBe(0);
        expect(logSpy.mock.calls[0][0]).toMatch(/^Usage: photo-store <command>/);
    });

    it('should fail on an unknown command', async () => {
        expect(await run(['frobnicate'])).toBe(1);
        expect(errorSpy).toHaveBeenCalledWith("Error: Unknown command 'frobnicate'");
    });

    it('should fail when options are given without a command', async () => {
        expect(await run(['--db', ':memory:'])).toBe(1);
        expect(errorSpy).toHaveBeenCalledWith('Error: Missing command');
    });

    it('should accept options before the command', async () => {
        expect(await run(['--db', ':memory:', 'stats'])).toBe(0);
        expect(logSpy).toHaveBeenCalledWith('  Total photos: 0');
    });

    it('should run a command against the database named by --db', async () => {
        expect(await run(['stats', '--db', ':memory:'])).toBe(0);
        expect(logSpy).toHaveBeenCalledWith('  Total photos: 0');
    });

    it('should print store errors and return a failure code', async () => {
        expect(await run(['info', '--photo-id', '5', '--db', ':memory:'])).toBe(1);
        expect(errorSpy).toHaveBeenCalledWith('Error: Photo 5 not found');
    });
});
