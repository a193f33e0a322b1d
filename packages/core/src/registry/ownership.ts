/**
 * Ownership policies decide what kind of handle a family's construct() returns.
 *
 * An abstract type picks its policy at compile time by extending
 * `DeclaresOwnership<K>`; types that declare nothing get shared handles.
 *
 * @example
 * ```typescript
 * interface Connection extends DeclaresOwnership<'exclusive'> {
 *   send(data: string): void;
 * }
 *
 * type Kind = PreferredOwnership<Connection>; // 'exclusive'
 * ```
 */

import { ExclusiveHandle, SharedHandle } from './handles.js';

export type OwnershipKind = 'exclusive' | 'shared' | 'raw';

export const OWNERSHIP_KINDS = ['exclusive', 'shared', 'raw'] as const satisfies readonly OwnershipKind[];

export function isOwnershipKind(value: unknown): value is OwnershipKind {
    return OWNERSHIP_KINDS.some((kind) => kind === value);
}

export const preferredOwnership: unique symbol = Symbol('registrar.preferredOwnership');

/**
 * Opt-in declaration of a preferred handle kind. The property is never set at
 * runtime; it only exists for PreferredOwnership to read.
 */
export interface DeclaresOwnership<K extends OwnershipKind> {
    readonly [preferredOwnership]?: K;
}

/**
 * Resolves the declared handle kind of T, or 'shared' when T declares none.
 * A declaration outside OwnershipKind resolves to never.
 */
export type PreferredOwnership<T> = T extends { readonly [preferredOwnership]?: infer K }
    ? unknown extends K
        ? 'shared'
        : Extract<K, OwnershipKind>
    : 'shared';

export type Handle<T, K> = K extends 'exclusive'
    ? ExclusiveHandle<T>
    : K extends 'raw'
      ? T
      : SharedHandle<T>;

export interface OwnershipPolicy<T, H, K = OwnershipKind> {
    readonly kind: K;
    wrap(value: T): H;
}

export function sharedOwnership<T>(): OwnershipPolicy<T, SharedHandle<T>, 'shared'> {
    return { kind: 'shared', wrap: (value) => SharedHandle.adopt(value) };
}

export function exclusiveOwnership<T>(): OwnershipPolicy<T, ExclusiveHandle<T>, 'exclusive'> {
    return { kind: 'exclusive', wrap: (value) => ExclusiveHandle.adopt(value) };
}

/**
 * Non-owning policy: values are returned as produced and the caller manages their lifetime.
 */
export function rawOwnership<T>(): OwnershipPolicy<T, T, 'raw'> {
    return { kind: 'raw', wrap: (value) => value };
}
