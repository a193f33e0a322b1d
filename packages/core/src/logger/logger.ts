/**
 * Registrar Logger
 *
 * Multi-transport logger with structured entries and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, RegistrarLogComponent } from './types.js';

export interface RegistrarLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    /** Component identifier */
    component: RegistrarLogComponent;
    /** Transport instances */
    transports: LoggerTransport[];
}

/**
 * Level holder shared between a logger and its children so setLevel propagates
 */
interface LevelRef {
    current: LogLevel;
}

/**
 * RegistrarLogger - Multi-transport logger with structured logging
 */
export class RegistrarLogger implements Logger {
    private levelRef: LevelRef;
    private component: RegistrarLogComponent;
    private transports: LoggerTransport[];

    // Lower number = more severe
    // If level is 'debug', logs error(0), warn(1), info(2), debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: RegistrarLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('debug')) {
            this.log('debug', message, context);
        }
    }

    silly(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('silly')) {
            this.log('silly', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('info')) {
            this.log('info', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('warn')) {
            this.log('warn', message, context);
        }
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('error')) {
            this.log('error', message, context);
        }
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    /**
     * Internal log method that creates log entry and sends to transports
     */
    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return RegistrarLogger.LEVELS[level] <= RegistrarLogger.LEVELS[this.levelRef.current];
    }

    /**
     * Create a child logger for a different component
     * Shares the same transports and level reference
     */
    createChild(component: RegistrarLogComponent): RegistrarLogger {
        return new RegistrarLogger(
            {
                level: this.levelRef.current,
                component,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    /**
     * Cleanup all transports
     */
    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
