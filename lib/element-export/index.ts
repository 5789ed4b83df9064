/**
 * Element Export Module
 *
 * Barrel export for the element export pipeline.
 *
 * Usage:
 *   import { exportElements, parseReportCsv } from 'element-export';
 */

// Types
export * from './types';
export * from './errors';

// Pipeline
export { exportElements, describePart, isPartObject } from './exportElements';
export {
  classifyDimensions,
  roundHalfAwayFromZero,
  toMillimeters,
  DEFAULT_LENGTH_UNIT,
  LENGTH_UNITS,
  MM_PER_UNIT,
} from './dimensions';
export { resolveMaterials } from './materials';
export {
  classifyEdgeBanding,
  createEmptyEdgeBanding,
  formatEdgeBandingDisplay,
  EDGE_BANDING_MARKERS,
} from './edgeBanding';
export { resolvePartName, buildPartKey, serializePartKey, UNNAMED_PART } from './partKey';
export { PartAggregator } from './aggregator';
export {
  sortPartRecords,
  compareReportRows,
  renderReportCsv,
  formatReportRow,
  formatName,
  CSV_HEADER,
  CSV_DELIMITER,
  EDGE_BANDING_MARK,
} from './reportSerializer';

// Input / output
export { parseScene, parseSceneJson, sceneSchema, type Scene, type SceneParseResult } from './sceneSchema';
export {
  parseReportCsv,
  validateRow,
  formatDimensionsDisplay,
  type ParsedReportRow,
  type ParsedReportResult,
  type RowValidation,
} from './reportParser';
export { loadConfig, loadEnvFiles, DEFAULT_OUTPUT_FILE, type ElementExportConfig } from './config';
export { runElementExport } from './cli';
