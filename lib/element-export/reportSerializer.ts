/**
 * Report Serializer
 *
 * Sorts aggregated parts and renders the element CSV:
 *
 *   label,deb,length,width,pices,eb1,eb2,eb3,eb4
 *   Shelf,18,600,300,2,x,,,
 *
 * Rows are ordered by thickness, then length, then width, all descending.
 */

import { ReportFormatError } from './errors';
import type { NameEscaping, PartRecord, ReportRow } from './types';

// ============================================================================
// Constants
// ============================================================================

export const CSV_DELIMITER = ',';
export const CSV_HEADER = 'label,deb,length,width,pices,eb1,eb2,eb3,eb4';
export const EDGE_BANDING_MARK = 'x';

const NEEDS_ESCAPING = /[",\r\n]/;

// ============================================================================
// Sorting
// ============================================================================

export function compareReportRows(a: PartRecord, b: PartRecord): number {
  return b.thickness_mm - a.thickness_mm || b.length_mm - a.length_mm || b.width_mm - a.width_mm;
}

/**
 * Returns frozen rows sorted by thickness, length, width (descending).
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export function sortPartRecords(records: readonly PartRecord[]): ReportRow[] {
  return [...records].sort(compareReportRows).map((record) => Object.freeze({ ...record }));
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Prepares a part name for the label column.
 */
export function formatName(name: string, escaping: NameEscaping = 'quote'): string {
  if (!NEEDS_ESCAPING.test(name)) return name;

  switch (escaping) {
    case 'preserve':
      return name;
    case 'reject':
      throw new ReportFormatError(
        `Part name ${JSON.stringify(name)} contains a comma, quote or line break`,
        name
      );
    case 'quote':
      return `"${name.replace(/"/g, '""')}"`;
  }
}

function formatFlag(flag: boolean): string {
  return flag ? EDGE_BANDING_MARK : '';
}

export function formatReportRow(row: ReportRow, escaping: NameEscaping = 'quote'): string {
  return [
    formatName(row.name, escaping),
    String(row.thickness_mm),
    String(row.length_mm),
    String(row.width_mm),
    String(row.count),
    formatFlag(row.eb1),
    formatFlag(row.eb2),
    formatFlag(row.eb3),
    formatFlag(row.eb4),
  ].join(CSV_DELIMITER);
}

/**
 * Renders the complete report. Every line, the last included, ends with "\n";
 * an empty row set yields the header line alone.
 */
export function renderReportCsv(rows: readonly ReportRow[], escaping: NameEscaping = 'quote'): string {
  const lines = [CSV_HEADER, ...rows.map((row) => formatReportRow(row, escaping))];
  return lines.map((line) => `${line}\n`).join('');
}
