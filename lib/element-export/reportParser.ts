/**
 * CSV Parser for Element Reports
 *
 * Reads a report written by the exporter back into typed rows.
 * Handles a BOM, any line ending, and double-quoted label fields.
 */

import { CSV_DELIMITER, CSV_HEADER, EDGE_BANDING_MARK } from './reportSerializer';
import type { ReportRow } from './types';

// ============================================================================
// Types
// ============================================================================

export interface RowValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ParsedReportRow extends ReportRow {
  validation: RowValidation;
  /** Original row index (0-based, excluding header) */
  rowIndex: number;
}

export interface ParsedReportResult {
  rows: ParsedReportRow[];
  /** Global parsing errors */
  errors: string[];
  /** Global parsing warnings */
  warnings: string[];
}

const COLUMN_COUNT = CSV_HEADER.split(CSV_DELIMITER).length;

// ============================================================================
// Parsing Functions
// ============================================================================

/**
 * Strips UTF-8 BOM from content if present.
 */
export function stripBOM(content: string): string {
  return content.replace(/^\uFEFF/, '');
}

/**
 * Splits CSV content into records. Line breaks inside quoted fields are kept.
 */
function splitRecords(content: string): string[] {
  const records: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of content) {
    if (char === '"') {
      inQuotes = !inQuotes;
    }
    if (char === '\n' && !inQuotes) {
      records.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  records.push(current);

  return records;
}

/**
 * Parses a single CSV record, handling quoted fields.
 */
export function parseCSVLine(line: string, delimiter: string = CSV_DELIMITER): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = line[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        // Escaped quote
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);

  return fields;
}

function parseInteger(value: string): number {
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : Number.NaN;
}

function parseFlag(value: string, column: string, errors: string[]): boolean {
  const trimmed = value.trim();
  if (trimmed === EDGE_BANDING_MARK) return true;
  if (trimmed !== '') {
    errors.push(`${column} must be "${EDGE_BANDING_MARK}" or empty`);
  }
  return false;
}

/**
 * Validates a parsed row's numbers and dimension order.
 */
export function validateRow(row: ReportRow): RowValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const dimensions: Array<[string, number]> = [
    ['deb', row.thickness_mm],
    ['length', row.length_mm],
    ['width', row.width_mm],
  ];
  for (const [column, value] of dimensions) {
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`Invalid or missing ${column}`);
    }
  }

  if (!Number.isInteger(row.count) || row.count <= 0) {
    errors.push('Invalid or missing pices');
  }

  if (!row.name.trim()) {
    warnings.push('No label');
  }

  if (errors.length === 0 && !(row.thickness_mm <= row.width_mm && row.width_mm <= row.length_mm)) {
    warnings.push('Dimensions are not ordered deb <= width <= length');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Main report parsing function.
 */
export function parseReportCsv(content: string): ParsedReportResult {
  const warnings: string[] = [];

  const cleanContent = stripBOM(content).replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  const records = splitRecords(cleanContent).filter((record) => record.trim());

  if (records.length === 0) {
    return { rows: [], errors: ['CSV file is empty'], warnings };
  }

  if (records[0].trim() !== CSV_HEADER) {
    return {
      rows: [],
      errors: [`Unexpected header "${records[0].trim()}", expected "${CSV_HEADER}"`],
      warnings,
    };
  }

  const rows: ParsedReportRow[] = [];

  for (let i = 1; i < records.length; i++) {
    const fields = parseCSVLine(records[i]);
    const rowErrors: string[] = [];

    if (fields.length !== COLUMN_COUNT) {
      rowErrors.push(`Expected ${COLUMN_COUNT} fields, found ${fields.length}`);
    }

    const getValue = (index: number): string => fields[index] ?? '';

    const row: ReportRow = {
      name: getValue(0),
      thickness_mm: parseInteger(getValue(1)),
      length_mm: parseInteger(getValue(2)),
      width_mm: parseInteger(getValue(3)),
      count: parseInteger(getValue(4)),
      eb1: parseFlag(getValue(5), 'eb1', rowErrors),
      eb2: parseFlag(getValue(6), 'eb2', rowErrors),
      eb3: parseFlag(getValue(7), 'eb3', rowErrors),
      eb4: parseFlag(getValue(8), 'eb4', rowErrors),
    };

    const validation = validateRow(row);
    const errors = [...rowErrors, ...validation.errors];

    rows.push({
      ...row,
      validation: { valid: errors.length === 0, errors, warnings: validation.warnings },
      rowIndex: i - 1,
    });
  }

  const invalidCount = rows.filter((row) => !row.validation.valid).length;
  if (invalidCount > 0) {
    warnings.push(`${invalidCount} of ${rows.length} rows failed validation`);
  }

  return { rows, errors: [], warnings };
}

/**
 * Formats dimensions for display (e.g., "600 x 300 x 18").
 */
export function formatDimensionsDisplay(row: ReportRow): string {
  return [row.length_mm, row.width_mm, row.thickness_mm].join(' x ');
}
