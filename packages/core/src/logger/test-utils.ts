/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { Logger, LogLevel } from './types.js';

/**
 * Creates a mock logger whose methods are vi.fn() mocks.
 * createChild returns the same mock so calls from every component land in one place.
 */
export function createMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        trackException: vi.fn(),
        createChild: vi.fn(() => mockLogger),
        destroy: vi.fn(async () => {}),
        setLevel: vi.fn(),
        getLevel: vi.fn((): LogLevel => 'info'),
    };
    return mockLogger;
}

/**
 * Creates a silent mock logger with no-op functions.
 */
export function createSilentMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: () => {},
        silly: () => {},
        info: () => {},
        warn: () => {},
        error: () => {},
        trackException: () => {},
        createChild: () => mockLogger,
        destroy: async () => {},
        setLevel: () => {},
        getLevel: () => 'info',
    };
    return mockLogger;
}
