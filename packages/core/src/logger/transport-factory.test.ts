import { describe, it, expect } from 'vitest';
import { createTransport, createTransports } from './transport-factory.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { SilentTransport } from './transports/silent-transport.js';
import { LoggerConfigSchema, LoggerTransportSchema } from './schemas.js';

describe('createTransport', () => {
    it('creates console and silent transports', () => {
        expect(createTransport({ type: 'console', colorize: false })).toBeInstanceOf(ConsoleTransport);
        expect(createTransport({ type: 'silent' })).toBeInstanceOf(SilentTransport);
    });

    it('creates one transport per config', () => {
        const transports = createTransports(LoggerConfigSchema.parse({}).transports);

        expect(transports).toHaveLength(1);
        expect(transports[0]).toBeInstanceOf(ConsoleTransport);
    });
});

describe('LoggerTransportSchema', () => {
    it('rejects unknown transport types', () => {
        expect(LoggerTransportSchema.safeParse({ type: 'file', path: '/tmp/log' }).success).toBe(false);
    });

    it('defaults colorize to true', () => {
        expect(LoggerTransportSchema.parse({ type: 'console' })).toEqual({ type: 'console', colorize: true });
    });
});
