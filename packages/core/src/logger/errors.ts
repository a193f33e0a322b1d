import { RegistrarRuntimeError } from '../errors/RegistrarRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 */
export class LoggerError {
    static unknownTransportType(transportType: string): RegistrarRuntimeError {
        return new RegistrarRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType },
            'Use one of: silent, console'
        );
    }
}
