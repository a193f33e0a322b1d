/**
 * Small implementation hierarchies shared by registry tests.
 */

import type { DeclaresOwnership } from '../registry/ownership.js';

export interface Shape {
    name(): string;
    area(): number;
}

export class Circle implements Shape {
    constructor(readonly radius: number) {}

    name(): string {
        return 'circle';
    }

    area(): number {
        return Math.PI * this.radius * this.radius;
    }
}

export class Square implements Shape {
    constructor(readonly side: number) {}

    name(): string {
        return 'square';
    }

    area(): number {
        return this.side * this.side;
    }
}

export interface Animal {
    readonly kind: 'animal';
    sound(): string;
}

export interface Vehicle {
    readonly kind: 'vehicle';
    wheels(): number;
}

/**
 * A resource that must have exactly one owner.
 */
export interface Connection extends DeclaresOwnership<'exclusive'> {
    readonly port: number;
    readonly closed: boolean;
    dispose(): void;
}

export class FakeConnection implements Connection {
    closed = false;

    constructor(readonly port: number) {}

    dispose(): void {
        this.closed = true;
    }
}

export interface Cursor extends DeclaresOwnership<'raw'> {
    position: number;
}

export interface Session extends DeclaresOwnership<'shared'> {
    readonly user: string;
}
