import type { Dimensions, EdgeBanding, PartKey, PartObject } from './types';

export const UNNAMED_PART = 'Unnamed';

function isBlank(value: string | null | undefined): boolean {
  return !value?.trim();
}

/**
 * Picks the display name for a part.
 *
 * The tag name is preferred; objects without a tag fall back to their instance
 * name. A blank result falls back to the definition name, then to "Unnamed".
 * The chosen name is kept untrimmed.
 */
export function resolvePartName(object: PartObject): string {
  const primary = object.tag ?? object.name;
  if (primary && !isBlank(primary)) return primary;

  const definitionName = object.definition?.name;
  if (definitionName && !isBlank(definitionName)) return definitionName;

  return UNNAMED_PART;
}

export function buildPartKey(name: string, dimensions: Dimensions, banding: EdgeBanding): PartKey {
  return {
    name,
    thickness_mm: dimensions.thickness_mm,
    length_mm: dimensions.length_mm,
    width_mm: dimensions.width_mm,
    eb1: banding.eb1,
    eb2: banding.eb2,
    eb3: banding.eb3,
    eb4: banding.eb4,
  };
}

/**
 * Canonical string form of a key, used for map lookups.
 * JSON encoding keeps names containing separators from colliding.
 */
export function serializePartKey(key: PartKey): string {
  return JSON.stringify([
    key.name,
    key.thickness_mm,
    key.length_mm,
    key.width_mm,
    key.eb1,
    key.eb2,
    key.eb3,
    key.eb4,
  ]);
}
