import type { ZodIssue } from 'zod';
import { ErrorScope, ErrorType, type Issue } from '../errors/types.js';
import { createLogger } from '../logger/factory.js';
import { RegistrarLogComponent, type Logger } from '../logger/types.js';
import { RegistryErrorCode } from './error-codes.js';
import { RegistryError } from './errors.js';
import { RegistryConfigSchema, type DuplicatePolicy, type RegistryConfig } from './schemas.js';

export interface RegistrySettings {
    onDuplicate: DuplicatePolicy;
    logger: Logger;
}

export interface ConfigureRegistriesOptions {
    /** Use this logger instead of building one from config.logger */
    logger?: Logger;
}

/**
 * Raw configuration as read from the environment. Validated by configureRegistries.
 */
export interface RawRegistryConfig {
    onDuplicate?: string;
    logger?: { level?: string };
}

let settings: RegistrySettings | undefined;

export function toIssues(zodIssues: ZodIssue[], code: RegistryErrorCode, scope: ErrorScope): Issue[] {
    return zodIssues.map((issue): Issue => ({
        code,
        message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        scope,
        type: ErrorType.USER,
        severity: 'error',
        path: issue.path,
    }));
}

function applyConfig(
    input: unknown,
    options: ConfigureRegistriesOptions
): { config: RegistryConfig; applied: RegistrySettings } {
    const result = RegistryConfigSchema.safeParse(input);
    if (!result.success) {
        throw RegistryError.invalidConfig(
            toIssues(result.error.issues, RegistryErrorCode.INVALID_CONFIG, ErrorScope.CONFIG)
        );
    }

    const config = result.data;
    const logger = options.logger ?? createLogger({ config: config.logger });
    const applied: RegistrySettings = { onDuplicate: config.onDuplicate, logger };
    settings = applied;

    logger
        .createChild(RegistrarLogComponent.CONFIG)
        .debug('Registry configuration applied', { onDuplicate: config.onDuplicate });

    return { config, applied };
}

/**
 * Validate and apply process-wide registry settings.
 *
 * Settings are read on every insert, so registrations that already ran keep
 * the outcome they had under the previous settings.
 *
 * @throws RegistrarRuntimeError (registry_invalid_config) when input fails validation
 */
export function configureRegistries(
    input: unknown = {},
    options: ConfigureRegistriesOptions = {}
): RegistryConfig {
    return applyConfig(input, options).config;
}

/**
 * Read REGISTRAR_ON_DUPLICATE and REGISTRAR_LOG_LEVEL.
 */
export function loadRegistryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RawRegistryConfig {
    const config: RawRegistryConfig = {};

    const onDuplicate = env.REGISTRAR_ON_DUPLICATE?.trim().toLowerCase();
    if (onDuplicate) {
        config.onDuplicate = onDuplicate;
    }

    const level = env.REGISTRAR_LOG_LEVEL?.trim().toLowerCase();
    if (level) {
        config.logger = { level };
    }

    return config;
}

/**
 * Current settings. The first call without prior configuration falls back to
 * the environment, so it is safe from module-scope registration code.
 * Environment values that fail validation are reported and replaced by the
 * defaults; this never throws.
 */
export function getRegistrySettings(): RegistrySettings {
    if (settings) {
        return settings;
    }

    const result = RegistryConfigSchema.safeParse(loadRegistryConfigFromEnv());
    if (result.success) {
        return applyConfig(result.data, {}).applied;
    }

    const fallback = applyConfig({}, {}).applied;
    fallback.logger
        .createChild(RegistrarLogComponent.CONFIG)
        .warn('Ignoring invalid registry configuration from the environment', {
            issues: toIssues(result.error.issues, RegistryErrorCode.INVALID_CONFIG, ErrorScope.CONFIG).map(
                (issue) => issue.message
            ),
        });
    return fallback;
}
