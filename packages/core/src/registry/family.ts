import { ErrorScope } from '../errors/types.js';
import { trackFamily, type DiscoverableFamily } from './discovery.js';
import { RegistryErrorCode } from './error-codes.js';
import { RegistryError } from './errors.js';
import type { SharedHandle } from './handles.js';
import {
    isOwnershipKind,
    sharedOwnership,
    type Handle,
    type OwnershipKind,
    type OwnershipPolicy,
    type PreferredOwnership,
} from './ownership.js';
import { toIssues } from './config.js';
import { FactoryRegistry } from './registry.js';
import { FamilyOptionsSchema, type FamilyOptions } from './schemas.js';

/**
 * A family of implementations of T, built from TArgs and returned as H.
 *
 * The family object is the identity of its registry: two families never share
 * keys, even when they share a name.
 */
export class FactoryFamily<T, TArgs extends unknown[], H> implements DiscoverableFamily {
    readonly name: string;
    readonly description: string | undefined;
    readonly ownership: OwnershipKind;
    readonly policy: OwnershipPolicy<T, H, unknown>;
    private factoryRegistry: FactoryRegistry<T, TArgs, H> | undefined;

    constructor(options: FamilyOptions, policy: OwnershipPolicy<T, H, unknown>) {
        const result = FamilyOptionsSchema.safeParse(options);
        if (!result.success) {
            throw RegistryError.invalidFamilyOptions(
                toIssues(result.error.issues, RegistryErrorCode.INVALID_FAMILY_OPTIONS, ErrorScope.REGISTRY)
            );
        }
        if (!isOwnershipKind(policy.kind)) {
            throw RegistryError.unknownOwnershipKind(result.data.name, String(policy.kind));
        }
        this.name = result.data.name;
        this.description = result.data.description;
        this.ownership = policy.kind;
        this.policy = policy;
    }

    /**
     * The family's registry, created on first access.
     */
    registry(): FactoryRegistry<T, TArgs, H> {
        if (!this.factoryRegistry) {
            this.factoryRegistry = new FactoryRegistry(this);
        }
        return this.factoryRegistry;
    }

    keys(): string[] {
        return this.factoryRegistry?.keys() ?? [];
    }
}

/**
 * Options accepted without a policy: only when T declares no ownership
 * preference, or declares 'shared'.
 */
export type DefaultOwnershipOptions<T> = [PreferredOwnership<T>] extends [never]
    ? never
    : PreferredOwnership<T> extends 'shared'
      ? FamilyOptions
      : never;

/**
 * Define a family of implementations.
 *
 * Types that declare no ownership preference produce shared handles. Types
 * that extend DeclaresOwnership<K> must pass the matching policy; any other
 * policy is a compile error.
 *
 * @example
 * ```typescript
 * interface Shape { name(): string; area(): number }
 * const shapes = defineFamily<Shape, [size: number]>({ name: 'shape' });
 *
 * interface Socket extends DeclaresOwnership<'exclusive'> { close(): void }
 * const sockets = defineFamily<Socket, [port: number]>({ name: 'socket' }, exclusiveOwnership());
 * ```
 */
export function defineFamily<T, TArgs extends unknown[] = []>(
    options: DefaultOwnershipOptions<T>
): FactoryFamily<T, TArgs, SharedHandle<T>>;
export function defineFamily<
    T,
    TArgs extends unknown[] = [],
    H = Handle<T, PreferredOwnership<T>>,
>(
    options: FamilyOptions,
    policy: OwnershipPolicy<T, H, PreferredOwnership<T>>
): FactoryFamily<T, TArgs, H>;
export function defineFamily<T, TArgs extends unknown[], H>(
    options: FamilyOptions,
    policy?: OwnershipPolicy<T, H, unknown>
): FactoryFamily<T, TArgs, H> | FactoryFamily<T, TArgs, SharedHandle<T>> {
    const family = policy
        ? new FactoryFamily<T, TArgs, H>(options, policy)
        : new FactoryFamily<T, TArgs, SharedHandle<T>>(options, sharedOwnership<T>());
    trackFamily(family);
    return family;
}
