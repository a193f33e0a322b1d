/**
 * Keyed factory registries
 *
 * 1. defineFamily - declare a family of implementations and its ownership policy
 * 2. Registrar / registration / applyRegistrations - bind keys to factories
 * 3. construct - build an implementation by key
 * 4. listFamilies - see what is registered at runtime
 */

export * from './ownership.js';
export * from './handles.js';
export * from './family.js';
export * from './registry.js';
export * from './registrar.js';
export * from './discovery.js';
export * from './schemas.js';
export * from './errors.js';
export * from './error-codes.js';
export {
    configureRegistries,
    getRegistrySettings,
    loadRegistryConfigFromEnv,
    type ConfigureRegistriesOptions,
    type RawRegistryConfig,
    type RegistrySettings,
} from './config.js';
