import dotenv from 'dotenv';
import { z } from 'zod';

import { ConfigError } from './errors';
import { lengthUnitSchema } from './sceneSchema';
import type { LengthUnit, NameEscaping } from './types';

export interface ElementExportConfig {
  unit: LengthUnit;
  nameEscaping: NameEscaping;
  outputPath: string;
  verbose: boolean;
}

export const DEFAULT_OUTPUT_FILE = 'dimenzije.csv';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  ELEMENT_EXPORT_UNIT: lengthUnitSchema.default('inch'),
  ELEMENT_EXPORT_NAME_ESCAPING: z.enum(['quote', 'reject', 'preserve']).default('quote'),
  ELEMENT_EXPORT_OUTPUT: z.string().trim().min(1, 'must not be empty').default(DEFAULT_OUTPUT_FILE),
  ELEMENT_EXPORT_VERBOSE: booleanFlag.default('false'),
});

/**
 * Loads .env.local and .env into process.env. Variables already set win.
 */
export function loadEnvFiles(): void {
  dotenv.config({ path: '.env.local' });
  dotenv.config();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ElementExportConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    unit: data.ELEMENT_EXPORT_UNIT,
    nameEscaping: data.ELEMENT_EXPORT_NAME_ESCAPING,
    outputPath: data.ELEMENT_EXPORT_OUTPUT,
    verbose: data.ELEMENT_EXPORT_VERBOSE,
  };
}
