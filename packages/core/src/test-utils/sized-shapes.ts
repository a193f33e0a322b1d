import { defineFamily } from '../registry/family.js';
import { Registrar } from '../registry/registrar.js';
import { Circle, Square, type Shape } from './implementations.js';

export const sizedShapes = defineFamily<Shape>({ name: 'sized-shape' });

export const smallCircle = new Registrar(sizedShapes, 'small-circle', () => new Circle(1));
export const largeSquare = new Registrar(sizedShapes, 'large-square', () => new Square(10));
