import { RegistrarLogComponent } from '../logger/types.js';
import { getRegistrySettings } from './config.js';
import type { FactoryFamily } from './family.js';
import { getOrCreateRegistry, type FactoryFn } from './registry.js';

export interface RegistrationOutcome {
    family: string;
    key: string;
    /** false when an earlier registration already held the key */
    inserted: boolean;
}

/**
 * Binds one implementation to a key the moment it is constructed.
 * Declare it at module scope so importing the module registers it.
 *
 * @example
 * ```typescript
 * export const circleRegistrar = new Registrar(shapes, 'circle', (size: number) => new Circle(size));
 * ```
 */
export class Registrar<T, TArgs extends unknown[], H> {
    readonly inserted: boolean;

    constructor(
        readonly family: FactoryFamily<T, TArgs, H>,
        readonly key: string,
        factory: FactoryFn<T, NoInfer<TArgs>>
    ) {
        const registry = getOrCreateRegistry(family);
        const taken = registry.has(key);
        registry.insert(key, factory);
        this.inserted = !taken;
    }

    outcome(): RegistrationOutcome {
        return { family: this.family.name, key: this.key, inserted: this.inserted };
    }
}

/**
 * A registration described ahead of time and applied by the host.
 */
export interface Registration {
    readonly family: string;
    readonly key: string;
    apply(): RegistrationOutcome;
}

export interface RegistrationReport {
    /** `family/key` of each registration that took effect */
    inserted: string[];
    /** `family/key` of each registration that lost to an earlier one */
    skipped: string[];
}

export function registration<T, TArgs extends unknown[], H>(
    family: FactoryFamily<T, TArgs, H>,
    key: string,
    factory: FactoryFn<T, NoInfer<TArgs>>
): Registration {
    return {
        family: family.name,
        key,
        apply: () => new Registrar(family, key, factory).outcome(),
    };
}

/**
 * Apply registrations in list order. Earlier entries win over later ones
 * for the same key, so the order of the list is the precedence.
 */
export function applyRegistrations(registrations: readonly Registration[]): RegistrationReport {
    const report: RegistrationReport = { inserted: [], skipped: [] };

    for (const entry of registrations) {
        const outcome = entry.apply();
        const label = `${outcome.family}/${outcome.key}`;
        if (outcome.inserted) {
            report.inserted.push(label);
        } else {
            report.skipped.push(label);
        }
    }

    getRegistrySettings()
        .logger.createChild(RegistrarLogComponent.REGISTRAR)
        .info(`Applied ${report.inserted.length} registrations`, {
            inserted: report.inserted,
            skipped: report.skipped,
        });

    return report;
}
