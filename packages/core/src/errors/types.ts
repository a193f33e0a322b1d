import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { RegistryErrorCode } from '../registry/error-codes.js';

/**
 * Error scopes representing functional domains in the library
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    REGISTRY = 'registry', // Family definition, registration, lookup and handles
    CONFIG = 'config', // Registry configuration parsing and validation
    LOGGER = 'logger', // Logging system operations, transports, and configuration
}

/**
 * Error types describing the nature of the failure
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // requested key or family doesn't exist
    CONFLICT = 'conflict', // duplicate registration
    SYSTEM = 'system', // bugs, internal failures, unexpected states
}

/**
 * Union type for all error codes across domains
 */
export type RegistrarErrorCode = RegistryErrorCode | LoggerErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: RegistrarErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
