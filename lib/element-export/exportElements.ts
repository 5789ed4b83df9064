/**
 * Element Export Pipeline
 *
 * Turns a host selection into the element CSV. Runs in two phases: every
 * group/component is classified and counted, then the aggregate is sorted and
 * rendered once. Other selected entities are skipped.
 */

import { PartAggregator } from './aggregator';
import { classifyDimensions, DEFAULT_LENGTH_UNIT } from './dimensions';
import { classifyEdgeBanding } from './edgeBanding';
import { resolveMaterials } from './materials';
import { buildPartKey, resolvePartName } from './partKey';
import { renderReportCsv, sortPartRecords } from './reportSerializer';
import type { ExportOptions, ExportResult, LengthUnit, PartKey, PartObject, RawObject } from './types';

export function isPartObject(object: RawObject): object is PartObject {
  return object.kind === 'group' || object.kind === 'component';
}

/**
 * Computes the identity of a single group or component.
 */
export function describePart(object: PartObject, unit: LengthUnit = DEFAULT_LENGTH_UNIT): PartKey {
  const dimensions = classifyDimensions(object.bounds, unit);
  const banding = classifyEdgeBanding(resolveMaterials(object));
  return buildPartKey(resolvePartName(object), dimensions, banding);
}

export function exportElements(
  selection: Iterable<RawObject>,
  options: ExportOptions = {}
): ExportResult {
  const { unit = DEFAULT_LENGTH_UNIT, nameEscaping = 'quote' } = options;
  const aggregator = new PartAggregator();
  let skipped = 0;

  for (const object of selection) {
    if (!isPartObject(object)) {
      skipped += 1;
      continue;
    }
    aggregator.observe(describePart(object, unit));
  }

  const rows = sortPartRecords(aggregator.toRecords());

  return {
    csv: renderReportCsv(rows, nameEscaping),
    rows,
    processed: aggregator.totalCount,
    skipped,
  };
}
