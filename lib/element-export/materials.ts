import type { PartObject } from './types';

/**
 * Collects every material used on an object, in lookup order:
 * 1. Instance material
 * 2. Definition material
 * 3. Face materials of the definition's entities
 *
 * Names are lower-cased and deduplicated, first occurrence wins.
 */
export function resolveMaterials(object: PartObject): string[] {
  const found: string[] = [];

  if (object.material) found.push(object.material);

  const { definition } = object;
  if (definition) {
    if (definition.material) found.push(definition.material);

    for (const faceMaterial of definition.faceMaterials ?? []) {
      if (faceMaterial) found.push(faceMaterial);
    }
  }

  return Array.from(new Set(found.map((name) => name.toLowerCase())));
}
