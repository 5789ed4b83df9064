/**
 * Edge Banding Detection
 *
 * Edges are banded by painting them with one of four reserved materials.
 * Each marker maps to one column of the report.
 */

import type { EdgeBanding } from './types';

// ============================================================================
// Constants
// ============================================================================

/** Reserved marker material (trimmed, lower-case) per flag */
export const EDGE_BANDING_MARKERS: Record<keyof EdgeBanding, string> = {
  eb1: 'color a01',
  eb2: 'color a02',
  eb3: 'color a03',
  eb4: 'color a04',
};

const EDGE_BANDING_FLAGS = ['eb1', 'eb2', 'eb3', 'eb4'] as const;

// ============================================================================
// Classification
// ============================================================================

export function createEmptyEdgeBanding(): EdgeBanding {
  return { eb1: false, eb2: false, eb3: false, eb4: false };
}

/**
 * Maps material names onto edge banding flags.
 * Matching ignores case and surrounding whitespace; unknown names are ignored.
 */
export function classifyEdgeBanding(materials: Iterable<string>): EdgeBanding {
  const banding = createEmptyEdgeBanding();

  for (const material of materials) {
    const normalized = material.trim().toLowerCase();
    for (const flag of EDGE_BANDING_FLAGS) {
      if (normalized === EDGE_BANDING_MARKERS[flag]) {
        banding[flag] = true;
      }
    }
  }

  return banding;
}

/**
 * Formats flags for display (e.g. "1 3" for eb1 and eb3).
 */
export function formatEdgeBandingDisplay(banding: EdgeBanding): string {
  const edges = EDGE_BANDING_FLAGS.filter((flag) => banding[flag]).map((flag) => flag.slice(2));
  return edges.length > 0 ? edges.join(' ') : '-';
}
