import { RegistrarLogComponent } from '../logger/types.js';
import { getRegistrySettings } from './config.js';
import { RegistryError } from './errors.js';
import type { FactoryFamily } from './family.js';

export type FactoryFn<T, TArgs extends unknown[]> = (...args: TArgs) => T;

/**
 * Key to factory mapping for one family.
 *
 * Factories produce the abstract value; the family's ownership policy turns
 * it into the handle construct() returns.
 */
export class FactoryRegistry<T, TArgs extends unknown[], H> {
    private readonly factories = new Map<string, FactoryFn<T, TArgs>>();

    constructor(private readonly family: FactoryFamily<T, TArgs, H>) {}

    /**
     * Insert a factory if the key is absent. The first registration of a key
     * always wins; what happens to later ones depends on the onDuplicate setting.
     *
     * @throws RegistrarRuntimeError (registry_duplicate_key) when onDuplicate is 'error'
     */
    insert(key: string, factory: FactoryFn<T, TArgs>): void {
        const { onDuplicate, logger } = getRegistrySettings();
        const log = logger.createChild(RegistrarLogComponent.REGISTRY);
        const context = { family: this.family.name, key };

        if (this.factories.has(key)) {
            switch (onDuplicate) {
                case 'error':
                    throw RegistryError.duplicateKey(this.family.name, key);
                case 'warn':
                    log.warn(
                        `Ignoring duplicate registration of '${key}' in family '${this.family.name}'`,
                        context
                    );
                    return;
                case 'ignore':
                    log.debug(`Duplicate registration of '${key}' ignored`, context);
                    return;
            }
        }

        this.factories.set(key, factory);
        log.debug(`Registered '${key}' in family '${this.family.name}'`, context);
    }

    /**
     * Build the implementation registered under key.
     *
     * Under rawOwnership a factory that itself returns undefined looks the
     * same as a missing key; use has() or constructOrThrow() to tell them apart.
     *
     * @returns the handle, or undefined when nothing is registered under key
     */
    construct(key: string, ...args: TArgs): H | undefined {
        const factory = this.factories.get(key);
        if (!factory) {
            return undefined;
        }
        return this.build(key, factory, args);
    }

    /**
     * Like construct(), but an unknown key is an error.
     *
     * @throws RegistrarRuntimeError (registry_unknown_key)
     */
    constructOrThrow(key: string, ...args: TArgs): H {
        const factory = this.factories.get(key);
        if (!factory) {
            throw RegistryError.unknownKey(this.family.name, key, this.keys());
        }
        return this.build(key, factory, args);
    }

    has(key: string): boolean {
        return this.factories.has(key);
    }

    keys(): string[] {
        return Array.from(this.factories.keys());
    }

    get size(): number {
        return this.factories.size;
    }

    // Factory failures are logged and rethrown as they are.
    private build(key: string, factory: FactoryFn<T, TArgs>, args: TArgs): H {
        let value: T;
        try {
            value = factory(...args);
        } catch (error) {
            if (error instanceof Error) {
                getRegistrySettings()
                    .logger.createChild(RegistrarLogComponent.REGISTRY)
                    .trackException(error, { family: this.family.name, key });
            }
            throw error;
        }
        return this.family.policy.wrap(value);
    }
}

/**
 * The process-wide registry of a family, created empty on first call.
 * Depends on nothing but the family object, so module-scope registrars can
 * call it in any order.
 */
export function getOrCreateRegistry<T, TArgs extends unknown[], H>(
    family: FactoryFamily<T, TArgs, H>
): FactoryRegistry<T, TArgs, H> {
    return family.registry();
}

/**
 * Construction entry point.
 *
 * @example
 * ```typescript
 * const shape = construct(shapes, 'circle', 2);
 * if (shape) {
 *   console.log(shape.get().area());
 * }
 * ```
 */
export function construct<T, TArgs extends unknown[], H>(
    family: FactoryFamily<T, TArgs, H>,
    key: string,
    ...args: TArgs
): H | undefined {
    return getOrCreateRegistry(family).construct(key, ...args);
}

export function constructOrThrow<T, TArgs extends unknown[], H>(
    family: FactoryFamily<T, TArgs, H>,
    key: string,
    ...args: TArgs
): H {
    return getOrCreateRegistry(family).constructOrThrow(key, ...args);
}
