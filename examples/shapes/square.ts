import { Registrar } from '@registrar/core';
import { shapes, type Shape } from './shape.js';

class Square implements Shape {
    constructor(private readonly side: number) {}

    name(): string {
        return 'square';
    }

    area(): number {
        return this.side * this.side;
    }
}

export const squareRegistrar = new Registrar(shapes, 'square', (size) => new Square(size));
