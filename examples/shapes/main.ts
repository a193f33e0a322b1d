/**
 * Shape Registry Example
 *
 * Implementation modules register themselves when imported; the host only
 * imports them and asks for shapes by key.
 */

import './configure.js';
import { construct, listFamilies } from '@registrar/core';
import { shapes } from './shape.js';
import './circle.js';
import './square.js';

for (const key of ['circle', 'square', 'triangle']) {
    const shape = construct(shapes, key, 2);
    if (!shape) {
        console.log(`${key}: not registered`);
        continue;
    }
    console.log(`${key}: area ${shape.get().area().toFixed(2)}`);
    shape.release();
}

console.log('\nRegistered families:');
for (const family of listFamilies()) {
    console.log(`  - ${family.name} (${family.ownership}): ${family.keys.join(', ')}`);
}
