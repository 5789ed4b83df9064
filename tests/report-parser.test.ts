import test from 'node:test';
import assert from 'node:assert/strict';

import { formatDimensionsDisplay, parseReportCsv } from '../lib/element-export/reportParser';
import { CSV_HEADER, renderReportCsv } from '../lib/element-export/reportSerializer';
import type { ReportRow } from '../lib/element-export/types';

test('reads back a rendered report, quoted names included', () => {
  const rows: ReportRow[] = [
    {
      name: 'Door, "left"',
      thickness_mm: 18,
      length_mm: 720,
      width_mm: 400,
      count: 2,
      eb1: true,
      eb2: false,
      eb3: true,
      eb4: false,
    },
    {
      name: 'Back',
      thickness_mm: 3,
      length_mm: 700,
      width_mm: 500,
      count: 1,
      eb1: false,
      eb2: false,
      eb3: false,
      eb4: false,
    },
  ];

  const result = parseReportCsv(renderReportCsv(rows));

  assert.deepEqual(result.errors, []);
  assert.deepEqual(result.warnings, []);
  assert.deepEqual(
    result.rows.map(({ validation: _validation, rowIndex: _rowIndex, ...row }) => row),
    rows
  );
  assert.deepEqual(
    result.rows.map((row) => row.rowIndex),
    [0, 1]
  );
  assert.ok(result.rows.every((row) => row.validation.valid));
});

test('handles a BOM and CRLF line endings', () => {
  const result = parseReportCsv(`\uFEFF${CSV_HEADER}\r\nShelf,18,600,300,2,x,,,\r\n`);

  assert.deepEqual(result.errors, []);
  assert.equal(result.rows.length, 1);
  assert.equal(result.rows[0].name, 'Shelf');
  assert.equal(result.rows[0].count, 2);
  assert.equal(result.rows[0].eb1, true);
});

test('keeps line breaks inside quoted names', () => {
  const result = parseReportCsv(`${CSV_HEADER}\n"Two\nlines",18,600,300,1,,,,\n`);

  assert.equal(result.rows.length, 1);
  assert.equal(result.rows[0].name, 'Two\nlines');
});

test('reports an empty file', () => {
  assert.deepEqual(parseReportCsv('\n\n').errors, ['CSV file is empty']);
});

test('rejects an unexpected header', () => {
  const result = parseReportCsv('name,deb\nShelf,18\n');

  assert.deepEqual(result.rows, []);
  assert.deepEqual(result.errors, [
    'Unexpected header "name,deb", expected "label,deb,length,width,pices,eb1,eb2,eb3,eb4"',
  ]);
});

// ============================================================================
// Row Validation
// ============================================================================

test('flags banding values other than x', () => {
  const result = parseReportCsv(`${CSV_HEADER}\nShelf,18,600,300,2,x,y,,\n`);
  const [row] = result.rows;

  assert.equal(row.validation.valid, false);
  assert.deepEqual(row.validation.errors, ['eb2 must be "x" or empty']);
  assert.deepEqual(result.warnings, ['1 of 1 rows failed validation']);
});

test('flags a non-positive count', () => {
  const [row] = parseReportCsv(`${CSV_HEADER}\nShelf,18,600,300,0,,,,\n`).rows;
  assert.deepEqual(row.validation.errors, ['Invalid or missing pices']);
});

test('flags non-numeric dimensions', () => {
  const [row] = parseReportCsv(`${CSV_HEADER}\nShelf,abc,600,300,1,,,,\n`).rows;
  assert.deepEqual(row.validation.errors, ['Invalid or missing deb']);
});

test('flags a short row', () => {
  const [row] = parseReportCsv(`${CSV_HEADER}\nShelf,18,600,300,2,x\n`).rows;

  assert.deepEqual(row.validation.errors, ['Expected 9 fields, found 6']);
  assert.equal(row.eb1, true);
  assert.equal(row.eb4, false);
});

test('warns about unordered dimensions and blank labels', () => {
  const result = parseReportCsv(`${CSV_HEADER}\nShelf,18,300,600,1,,,,\n,3,700,500,1,,,,\n`);

  assert.equal(result.rows[0].validation.valid, true);
  assert.deepEqual(result.rows[0].validation.warnings, [
    'Dimensions are not ordered deb <= width <= length',
  ]);
  assert.deepEqual(result.rows[1].validation.warnings, ['No label']);
  assert.deepEqual(result.warnings, []);
});

test('formats dimensions for display', () => {
  const [row] = parseReportCsv(`${CSV_HEADER}\nShelf,18,600,300,2,,,,\n`).rows;
  assert.equal(formatDimensionsDisplay(row), '600 x 300 x 18');
});
