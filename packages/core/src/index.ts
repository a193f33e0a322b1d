/**
 * @registrar/core - Main entry point
 *
 * Keyed factory registries with module-scope self-registration.
 */

// Registries, registrars, ownership and discovery
export * from './registry/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';
