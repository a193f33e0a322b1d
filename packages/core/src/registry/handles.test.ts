import { describe, it, expect, vi } from 'vitest';
import { ExclusiveHandle, SharedHandle } from './handles.js';
import { RegistryErrorCode } from './error-codes.js';
import { ErrorScope, ErrorType } from '../errors/types.js';

function disposable(label: string) {
    return { label, dispose: vi.fn() };
}

describe('SharedHandle', () => {
    it('starts with a single owner', () => {
        const handle = SharedHandle.adopt({ label: 'a' });

        expect(handle.useCount).toBe(1);
        expect(handle.released).toBe(false);
        expect(handle.get()).toEqual({ label: 'a' });
    });

    it('shares one value between clones', () => {
        const value = { label: 'a' };
        const first = SharedHandle.adopt(value);
        const second = first.clone();

        expect(second.get()).toBe(value);
        expect(first.useCount).toBe(2);
        expect(second.useCount).toBe(2);
    });

    it('disposes the value only when the last handle is released', () => {
        const value = disposable('a');
        const first = SharedHandle.adopt(value);
        const second = first.clone();

        first.release();
        expect(value.dispose).not.toHaveBeenCalled();
        expect(second.useCount).toBe(1);
        expect(second.get()).toBe(value);

        second.release();
        expect(value.dispose).toHaveBeenCalledTimes(1);
    });

    it('treats a second release of the same handle as a no-op', () => {
        const value = disposable('a');
        const first = SharedHandle.adopt(value);
        const second = first.clone();

        first.release();
        first.release();

        expect(second.useCount).toBe(1);
        expect(value.dispose).not.toHaveBeenCalled();
    });

    it('throws when a released handle is used', () => {
        const handle = SharedHandle.adopt('value');
        handle.release();

        expect(handle.released).toBe(true);
        expect(handle.useCount).toBe(0);
        expect(() => handle.get()).toThrow(
            expect.objectContaining({
                code: RegistryErrorCode.HANDLE_RELEASED,
                scope: ErrorScope.REGISTRY,
                type: ErrorType.USER,
            })
        );
        expect(() => handle.clone()).toThrow('Cannot clone() a handle that has been released');
    });

    it('ignores values without a dispose method', () => {
        const handle = SharedHandle.adopt(42);
        expect(() => handle.release()).not.toThrow();
    });
});

describe('ExclusiveHandle', () => {
    it('has no clone operation', () => {
        const handle = ExclusiveHandle.adopt('value');
        expect('clone' in handle).toBe(false);
    });

    it('moves ownership and invalidates the source', () => {
        const value = disposable('a');
        const source = ExclusiveHandle.adopt(value);
        const target = source.move();

        expect(target.get()).toBe(value);
        expect(target.valid).toBe(true);
        expect(source.valid).toBe(false);
        expect(() => source.get()).toThrow(
            expect.objectContaining({ code: RegistryErrorCode.HANDLE_MOVED })
        );
        expect(() => source.move()).toThrow('Cannot move() a handle whose ownership was moved');
    });

    it('does not dispose when a moved-from handle is released', () => {
        const value = disposable('a');
        const source = ExclusiveHandle.adopt(value);
        const target = source.move();

        source.release();
        expect(value.dispose).not.toHaveBeenCalled();

        target.release();
        expect(value.dispose).toHaveBeenCalledTimes(1);
    });

    it('hands the value out with take()', () => {
        const value = disposable('a');
        const handle = ExclusiveHandle.adopt(value);

        expect(handle.take()).toBe(value);
        expect(handle.valid).toBe(false);

        handle.release();
        expect(value.dispose).not.toHaveBeenCalled();
    });

    it('disposes on release and rejects later use', () => {
        const value = disposable('a');
        const handle = ExclusiveHandle.adopt(value);

        handle.release();
        handle.release();

        expect(value.dispose).toHaveBeenCalledTimes(1);
        expect(() => handle.get()).toThrow(
            expect.objectContaining({ code: RegistryErrorCode.HANDLE_RELEASED })
        );
        expect(() => handle.take()).toThrow('Cannot take() a handle that has been released');
    });
});
