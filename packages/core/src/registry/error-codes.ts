/**
 * Registry-specific error codes
 * Covers family definition, registration, lookup and handle lifetime
 */
export enum RegistryErrorCode {
    // Registration
    DUPLICATE_KEY = 'registry_duplicate_key',
    INVALID_FAMILY_OPTIONS = 'registry_invalid_family_options',
    UNKNOWN_OWNERSHIP_KIND = 'registry_unknown_ownership_kind',

    // Lookup
    UNKNOWN_KEY = 'registry_unknown_key',

    // Handles
    HANDLE_RELEASED = 'registry_handle_released',
    HANDLE_MOVED = 'registry_handle_moved',

    // Configuration
    INVALID_CONFIG = 'registry_invalid_config',
}
