import { describe, it, expect, beforeEach } from 'vitest';
import { defineFamily } from './family.js';
import { Registrar } from './registrar.js';
import { findFamilies, listFamilies } from './discovery.js';
import { configureRegistries } from './config.js';
import { exclusiveOwnership } from './ownership.js';
import { createSilentMockLogger } from '../logger/test-utils.js';
import {
    Circle,
    FakeConnection,
    Square,
    type Connection,
    type Shape,
} from '../test-utils/implementations.js';

describe('discovery', () => {
    beforeEach(() => {
        configureRegistries({}, { logger: createSilentMockLogger() });
    });

    it('lists defined families with their keys', () => {
        const shapes = defineFamily<Shape, [size: number]>({
            name: 'discovery-shape',
            description: 'Plane figures',
        });
        const connections = defineFamily<Connection, [port: number]>(
            { name: 'discovery-connection' },
            exclusiveOwnership<Connection>()
        );
        new Registrar(shapes, 'circle', (size) => new Circle(size));
        new Registrar(shapes, 'square', (size) => new Square(size));
        new Registrar(connections, 'fake', (port) => new FakeConnection(port));

        const listed = listFamilies().filter((family) => family.name.startsWith('discovery-'));

        expect(listed).toEqual([
            {
                name: 'discovery-shape',
                ownership: 'shared',
                description: 'Plane figures',
                keys: ['circle', 'square'],
            },
            {
                name: 'discovery-connection',
                ownership: 'exclusive',
                keys: ['fake'],
            },
        ]);
    });

    it('lists families that have no registrations yet', () => {
        defineFamily<Shape>({ name: 'discovery-empty' });

        expect(findFamilies('discovery-empty')).toEqual([
            { name: 'discovery-empty', ownership: 'shared', keys: [] },
        ]);
    });

    it('finds every family sharing a name', () => {
        const first = defineFamily<Shape>({ name: 'discovery-twin' });
        defineFamily<Shape>({ name: 'discovery-twin' });
        new Registrar(first, 'circle', () => new Circle(1));

        expect(findFamilies('discovery-twin').map((family) => family.keys)).toEqual([['circle'], []]);
        expect(findFamilies('discovery-missing')).toEqual([]);
    });
});
