/**
 * Logger Configuration Schemas
 *
 * Zod schemas for logger configuration with multi-transport support.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Silent transport configuration (no-op, discards all logs)
 */
const SilentTransportSchema = z
    .object({
        type: z.literal('silent'),
    })
    .strict()
    .describe('Silent transport that discards all logs');

/**
 * Console transport configuration
 */
const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true).describe('Enable colored output'),
    })
    .strict()
    .describe('Console transport for terminal output');

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: LogLevelSchema.default('warn').describe('Minimum log level to record'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true }])
            .describe('Log output destinations'),
    })
    .strict()
    .describe('Logger configuration with multi-transport support');

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
