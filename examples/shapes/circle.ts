import { Registrar } from '@registrar/core';
import { shapes, type Shape } from './shape.js';

class Circle implements Shape {
    constructor(private readonly radius: number) {}

    name(): string {
        return 'circle';
    }

    area(): number {
        return Math.PI * this.radius * this.radius;
    }
}

// Importing this module is enough to make 'circle' available.
export const circleRegistrar = new Registrar(shapes, 'circle', (size) => new Circle(size));
