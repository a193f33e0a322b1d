import type { ErrorScope, ErrorType, RegistrarErrorCode } from './types.js';

/**
 * Runtime error thrown by registry, config and logger operations.
 *
 * Carries a stable `code`, the functional `scope` that raised it, and the
 * `type` of failure so callers can branch without parsing messages.
 */
export class RegistrarRuntimeError<C = Record<string, unknown>> extends Error {
    constructor(
        public readonly code: RegistrarErrorCode,
        public readonly scope: ErrorScope,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[]
    ) {
        super(message);
        this.name = 'RegistrarRuntimeError';
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            context: this.context,
            recovery: this.recovery,
        };
    }
}
