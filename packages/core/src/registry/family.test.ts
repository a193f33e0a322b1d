import { describe, it, expect, expectTypeOf, beforeEach } from 'vitest';
import { defineFamily, FactoryFamily } from './family.js';
import { Registrar } from './registrar.js';
import { configureRegistries } from './config.js';
import { RegistryErrorCode } from './error-codes.js';
import { exclusiveOwnership, sharedOwnership, type OwnershipPolicy } from './ownership.js';
import type { ExclusiveHandle, SharedHandle } from './handles.js';
import { createSilentMockLogger } from '../logger/test-utils.js';
import { ErrorScope } from '../errors/types.js';
import { Circle, type Connection, type Session, type Shape } from '../test-utils/implementations.js';

describe('defineFamily', () => {
    beforeEach(() => {
        configureRegistries({}, { logger: createSilentMockLogger() });
    });

    it('defaults to shared ownership', () => {
        const shapes = defineFamily<Shape, [size: number]>({ name: 'shape' });

        expect(shapes).toBeInstanceOf(FactoryFamily);
        expect(shapes.ownership).toBe('shared');
        expectTypeOf(shapes).toEqualTypeOf<FactoryFamily<Shape, [size: number], SharedHandle<Shape>>>();
    });

    it('accepts the policy a type declares', () => {
        const connections = defineFamily<Connection, [port: number]>(
            { name: 'connection', description: 'Network connections' },
            exclusiveOwnership<Connection>()
        );

        expect(connections.ownership).toBe('exclusive');
        expect(connections.description).toBe('Network connections');
        expectTypeOf(connections).toEqualTypeOf<
            FactoryFamily<Connection, [port: number], ExclusiveHandle<Connection>>
        >();
    });

    it('accepts an explicit shared policy for types that declare shared', () => {
        const sessions = defineFamily<Session>({ name: 'session' }, sharedOwnership<Session>());

        expect(sessions.ownership).toBe('shared');
    });

    it('trims the family name', () => {
        expect(defineFamily<Shape>({ name: '  shape ' }).name).toBe('shape');
    });

    it('rejects an empty name', () => {
        expect(() => defineFamily<Shape>({ name: '   ' })).toThrow(
            expect.objectContaining({
                code: RegistryErrorCode.INVALID_FAMILY_OPTIONS,
                scope: ErrorScope.REGISTRY,
                message: 'Invalid family options: name: Family name must not be empty',
            })
        );
    });

    it('rejects a policy object with an unknown kind', () => {
        const weak: OwnershipPolicy<Shape, Shape, unknown> = { kind: 'weak', wrap: (value) => value };

        expect(() => new FactoryFamily<Shape, [], Shape>({ name: 'shape' }, weak)).toThrow(
            "Family 'shape' uses unknown ownership kind 'weak'"
        );
    });

    it('creates its registry lazily', () => {
        const shapes = defineFamily<Shape, [size: number]>({ name: 'shape' });

        expect(shapes.keys()).toEqual([]);

        new Registrar(shapes, 'circle', (size) => new Circle(size));

        expect(shapes.keys()).toEqual(['circle']);
        expect(shapes.registry()).toBe(shapes.registry());
    });
});
