import { defineFamily } from '@registrar/core';

export interface Shape {
    name(): string;
    area(): number;
}

/**
 * Shapes are built from a single size argument and handed out as shared handles.
 */
export const shapes = defineFamily<Shape, [size: number]>({
    name: 'shape',
    description: 'Plane figures built from one size argument',
});
