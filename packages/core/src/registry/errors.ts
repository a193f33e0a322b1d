import { RegistrarRuntimeError } from '../errors/RegistrarRuntimeError.js';
import { ErrorScope, ErrorType, type Issue } from '../errors/types.js';
import { RegistryErrorCode } from './error-codes.js';

/**
 * Registry runtime error factory methods
 * Creates properly typed errors for registry operations
 */
export class RegistryError {
    static duplicateKey(family: string, key: string) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.DUPLICATE_KEY,
            ErrorScope.REGISTRY,
            ErrorType.CONFLICT,
            `Key '${key}' is already registered in family '${family}'`,
            { family, key },
            'Each key may be registered once per family. Rename one of the registrations or set onDuplicate to "warn"'
        );
    }

    static unknownKey(family: string, key: string, availableKeys: string[]) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.UNKNOWN_KEY,
            ErrorScope.REGISTRY,
            ErrorType.NOT_FOUND,
            `Key '${key}' not found in family '${family}'. Available: ${availableKeys.join(', ') || 'none'}`,
            { family, key, availableKeys }
        );
    }

    static handleReleased(operation: string) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.HANDLE_RELEASED,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Cannot ${operation}() a handle that has been released`,
            { operation }
        );
    }

    static handleMoved(operation: string) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.HANDLE_MOVED,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Cannot ${operation}() a handle whose ownership was moved`,
            { operation },
            'Use the handle returned by move() instead'
        );
    }

    static invalidFamilyOptions(issues: Issue[]) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.INVALID_FAMILY_OPTIONS,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Invalid family options: ${issues.map((issue) => issue.message).join('; ')}`,
            { issues }
        );
    }

    static unknownOwnershipKind(family: string, kind: string) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.UNKNOWN_OWNERSHIP_KIND,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Family '${family}' uses unknown ownership kind '${kind}'`,
            { family, kind },
            'Use sharedOwnership(), exclusiveOwnership() or rawOwnership()'
        );
    }

    static invalidConfig(issues: Issue[]) {
        return new RegistrarRuntimeError(
            RegistryErrorCode.INVALID_CONFIG,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid registry configuration: ${issues.map((issue) => issue.message).join('; ')}`,
            { issues }
        );
    }
}
