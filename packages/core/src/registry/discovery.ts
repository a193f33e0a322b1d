import type { OwnershipKind } from './ownership.js';

/**
 * Information about a defined family.
 */
export interface DiscoveredFamily {
    name: string;
    ownership: OwnershipKind;
    description?: string;
    /** Registered keys in registration order */
    keys: string[];
}

/**
 * The non-generic view of a family that discovery needs.
 */
export interface DiscoverableFamily {
    readonly name: string;
    readonly description: string | undefined;
    readonly ownership: OwnershipKind;
    keys(): string[];
}

// Families live for the rest of the process, like their registries.
const knownFamilies = new Set<DiscoverableFamily>();

export function trackFamily(family: DiscoverableFamily): void {
    knownFamilies.add(family);
}

function toDiscovered(family: DiscoverableFamily): DiscoveredFamily {
    const info: DiscoveredFamily = {
        name: family.name,
        ownership: family.ownership,
        keys: family.keys(),
    };
    if (family.description !== undefined) {
        info.description = family.description;
    }
    return info;
}

/**
 * List every family defined in this process, in definition order.
 *
 * @example
 * ```typescript
 * for (const family of listFamilies()) {
 *   console.log(`${family.name} (${family.ownership}): ${family.keys.join(', ')}`);
 * }
 * ```
 */
export function listFamilies(): DiscoveredFamily[] {
    return Array.from(knownFamilies, toDiscovered);
}

/**
 * Families with the given name. Names are labels, not identities, so more than one may match.
 */
export function findFamilies(name: string): DiscoveredFamily[] {
    return listFamilies().filter((family) => family.name === name);
}
