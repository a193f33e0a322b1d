/**
 * Logger Factory
 *
 * Bridges validated logger configuration and the RegistrarLogger implementation.
 */

import type { LoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { RegistrarLogComponent } from './types.js';
import { RegistrarLogger } from './logger.js';
import { createTransports } from './transport-factory.js';

export interface CreateLoggerOptions {
    /** Validated logger configuration */
    config: LoggerConfig;
    /** Component identifier (defaults to REGISTRY) */
    component?: RegistrarLogComponent;
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: LoggerConfigSchema.parse({ level: 'debug' }),
 *   component: RegistrarLogComponent.REGISTRAR,
 * });
 *
 * logger.info('Registered shape/circle');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, component = RegistrarLogComponent.REGISTRY } = options;

    return new RegistrarLogger({
        level: config.level,
        component,
        transports: createTransports(config.transports),
    });
}
