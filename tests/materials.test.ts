import test from 'node:test';
import assert from 'node:assert/strict';

import { resolveMaterials } from '../lib/element-export/materials';
import type { PartObject } from '../lib/element-export/types';

const bounds = { width: 1, height: 2, depth: 3 };

test('collects instance, definition and face materials in order', () => {
  const object: PartObject = {
    kind: 'component',
    bounds,
    material: 'Oak',
    definition: {
      name: 'Side',
      material: 'Color A01',
      faceMaterials: ['color a01', null, 'Walnut', 'OAK'],
    },
  };

  assert.deepEqual(resolveMaterials(object), ['oak', 'color a01', 'walnut']);
});

test('uses the instance material alone when there is no definition', () => {
  const object: PartObject = { kind: 'group', bounds, material: 'Color A03' };
  assert.deepEqual(resolveMaterials(object), ['color a03']);
});

test('returns nothing for an unpainted object', () => {
  const object: PartObject = {
    kind: 'group',
    bounds,
    material: null,
    definition: { material: null, faceMaterials: [null, null] },
  };
  assert.deepEqual(resolveMaterials(object), []);
});

test('lower-cases names without trimming them', () => {
  const object: PartObject = { kind: 'group', bounds, definition: { faceMaterials: [' Color A02 '] } };
  assert.deepEqual(resolveMaterials(object), [' color a02 ']);
});
