import { RegistryError } from './errors.js';

function hasDispose(value: unknown): value is { dispose(): void } {
    return (
        typeof value === 'object' &&
        value !== null &&
        'dispose' in value &&
        typeof value.dispose === 'function'
    );
}

function disposeValue(value: unknown): void {
    if (hasDispose(value)) {
        value.dispose();
    }
}

interface SharedControlBlock<T> {
    readonly value: T;
    count: number;
}

/**
 * Reference-counted handle. Every clone shares one control block; the value is
 * disposed (when it has a `dispose()` method) once the last handle is released.
 */
export class SharedHandle<T> {
    private block: SharedControlBlock<T> | undefined;

    private constructor(block: SharedControlBlock<T>) {
        this.block = block;
    }

    static adopt<T>(value: T): SharedHandle<T> {
        return new SharedHandle({ value, count: 1 });
    }

    get(): T {
        return this.liveBlock('get').value;
    }

    clone(): SharedHandle<T> {
        const block = this.liveBlock('clone');
        block.count += 1;
        return new SharedHandle(block);
    }

    /**
     * Drop this handle's reference. Releasing twice is a no-op.
     */
    release(): void {
        const block = this.block;
        if (!block) {
            return;
        }
        this.block = undefined;
        block.count -= 1;
        if (block.count === 0) {
            disposeValue(block.value);
        }
    }

    /** Number of live handles sharing the value; 0 once this handle is released */
    get useCount(): number {
        return this.block?.count ?? 0;
    }

    get released(): boolean {
        return this.block === undefined;
    }

    private liveBlock(operation: string): SharedControlBlock<T> {
        if (!this.block) {
            throw RegistryError.handleReleased(operation);
        }
        return this.block;
    }
}

/**
 * Sole-owner handle. It cannot be cloned; ownership only moves.
 */
export class ExclusiveHandle<T> {
    private slot: { readonly value: T } | undefined;
    private invalidatedBy: 'moved' | 'released' | undefined;

    private constructor(value: T) {
        this.slot = { value };
    }

    static adopt<T>(value: T): ExclusiveHandle<T> {
        return new ExclusiveHandle(value);
    }

    get(): T {
        return this.ownedSlot('get').value;
    }

    /**
     * Transfer ownership to a new handle. This handle becomes unusable.
     */
    move(): ExclusiveHandle<T> {
        const { value } = this.ownedSlot('move');
        this.invalidate('moved');
        return new ExclusiveHandle(value);
    }

    /**
     * Hand the value to the caller, who becomes responsible for its lifetime.
     */
    take(): T {
        const { value } = this.ownedSlot('take');
        this.invalidate('moved');
        return value;
    }

    /**
     * Dispose the value and invalidate the handle. No-op on a moved or released handle.
     */
    release(): void {
        const slot = this.slot;
        if (!slot) {
            return;
        }
        this.invalidate('released');
        disposeValue(slot.value);
    }

    get valid(): boolean {
        return this.slot !== undefined;
    }

    private invalidate(reason: 'moved' | 'released'): void {
        this.slot = undefined;
        this.invalidatedBy = reason;
    }

    private ownedSlot(operation: string): { readonly value: T } {
        if (!this.slot) {
            throw this.invalidatedBy === 'moved'
                ? RegistryError.handleMoved(operation)
                : RegistryError.handleReleased(operation);
        }
        return this.slot;
    }
}
