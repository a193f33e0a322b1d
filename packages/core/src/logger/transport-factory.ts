/**
 * Transport Factory
 *
 * Creates transport instances from configuration.
 */

import type { LoggerTransport } from './types.js';
import type { LoggerTransportConfig } from './schemas.js';
import { SilentTransport } from './transports/silent-transport.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { LoggerError } from './errors.js';

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();

        case 'console':
            return new ConsoleTransport({
                colorize: config.colorize,
            });

        default: {
            const exhaustive: never = config;
            throw LoggerError.unknownTransportType(JSON.stringify(exhaustive));
        }
    }
}

export function createTransports(configs: LoggerTransportConfig[]): LoggerTransport[] {
    return configs.map(createTransport);
}
