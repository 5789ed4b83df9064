import type { BoundingBoxExtents, Dimensions, LengthUnit } from './types';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_LENGTH_UNIT: LengthUnit = 'inch';

/** Millimetres per unit */
export const MM_PER_UNIT: Record<LengthUnit, number> = {
  inch: 25.4,
  foot: 304.8,
  mm: 1,
  cm: 10,
  m: 1000,
};

export const LENGTH_UNITS = Object.keys(MM_PER_UNIT) as LengthUnit[];

// ============================================================================
// Conversion
// ============================================================================

/**
 * Rounds to the nearest integer, halves away from zero (2.5 -> 3, -2.5 -> -3).
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.round(Math.abs(value));
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

export function toMillimeters(value: number, unit: LengthUnit = DEFAULT_LENGTH_UNIT): number {
  return value * MM_PER_UNIT[unit];
}

/**
 * Converts the three extents to whole millimetres and orders them so that
 * thickness <= width <= length. Degenerate boxes are passed through as-is.
 */
export function classifyDimensions(
  extents: BoundingBoxExtents,
  unit: LengthUnit = DEFAULT_LENGTH_UNIT
): Dimensions {
  const [thickness_mm, width_mm, length_mm] = [extents.width, extents.height, extents.depth]
    .map((extent) => roundHalfAwayFromZero(toMillimeters(extent, unit)))
    .sort((a, b) => a - b);

  return { thickness_mm, width_mm, length_mm };
}
