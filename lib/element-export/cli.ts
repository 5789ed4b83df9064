import fs from 'fs';

import { loadConfig, type ElementExportConfig } from './config';
import { formatEdgeBandingDisplay } from './edgeBanding';
import { exportElements, isPartObject } from './exportElements';
import { formatDimensionsDisplay } from './reportParser';
import { parseSceneJson } from './sceneSchema';
import type { ExportResult } from './types';

export const USAGE = 'Usage: element-export <scene.json> [output.csv]';
export const EMPTY_SELECTION_MESSAGE = 'Please select at least one Group or Component.';
export const COMPLETE_MESSAGE = 'element export complete!';

/**
 * Runs one export from a scene dump file to a CSV file.
 * Returns the process exit code.
 */
export function runElementExport(
  args: string[],
  env: NodeJS.ProcessEnv = process.env
): number {
  const [scenePath, outputArg] = args;

  if (!scenePath) {
    console.error(USAGE);
    return 1;
  }

  let config: ElementExportConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    return 1;
  }

  let content: string;
  try {
    content = fs.readFileSync(scenePath, 'utf8');
  } catch (error) {
    console.error(`Failed to read scene file ${scenePath}:`, error);
    return 1;
  }

  const scene = parseSceneJson(content);
  if (!scene.success) {
    console.error(`Invalid scene file ${scenePath}:`);
    for (const message of scene.errors) {
      console.error(`  ${message}`);
    }
    return 1;
  }

  const { selection } = scene.data;
  if (!selection.some(isPartObject)) {
    console.error(EMPTY_SELECTION_MESSAGE);
    return 1;
  }

  const unit = scene.data.unit ?? config.unit;
  let result: ExportResult;
  try {
    result = exportElements(selection, { unit, nameEscaping: config.nameEscaping });
  } catch (error) {
    console.error('Export failed:', error instanceof Error ? error.message : error);
    return 1;
  }

  if (config.verbose) {
    console.log(`Read ${selection.length} objects from ${scenePath} (unit: ${unit})`);
    if (result.skipped > 0) {
      console.warn(`Skipped ${result.skipped} objects that are not groups or components`);
    }
    for (const row of result.rows) {
      console.log(
        `  ${row.name}: ${formatDimensionsDisplay(row)} x${row.count} [edges: ${formatEdgeBandingDisplay(row)}]`
      );
    }
  }

  const outputPath = outputArg ?? config.outputPath;
  try {
    fs.writeFileSync(outputPath, result.csv, 'utf8');
  } catch (error) {
    console.error(`Failed to write ${outputPath}:`, error);
    return 1;
  }

  console.log(`${COMPLETE_MESSAGE} ${result.rows.length} parts written to ${outputPath}`);
  return 0;
}
