import { vi } from 'vitest';
import type { Logger } from './types.js';

/**
 * Logger whose methods are `vi.fn()` spies. Children are the same object, so
 * assertions see what any component logged.
 */
export function createMockLogger(): Logger {
    const logger: Logger = {
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        silly: vi.fn(),
        trackException: vi.fn(),
        createChild: vi.fn(() => logger),
        setLevel: vi.fn(),
        getLevel: vi.fn(() => 'info' as const),
        destroy: vi.fn(async () => {}),
    };
    return logger;
}

/**
 * No-op logger for tests that do not inspect log output
 */
export function createSilentMockLogger(): Logger {
    const noop = () => {};
    const logger: Logger = {
        error: noop,
        warn: noop,
        info: noop,
        debug: noop,
        silly: noop,
        trackException: noop,
        createChild: () => logger,
        setLevel: noop,
        getLevel: () => 'info',
        destroy: async () => {},
    };
    return logger;
}
