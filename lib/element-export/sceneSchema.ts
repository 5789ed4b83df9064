/**
 * Scene dump validation.
 *
 * A scene dump is the JSON form of the host selection:
 *
 *   { "unit": "inch", "selection": [{ "kind": "group", "bounds": {...}, ... }] }
 *
 * Groups and components are validated in full. Entities of any other kind
 * only need a kind; they are skipped by the exporter.
 */

import { z } from 'zod';

import type { LengthUnit, RawObject } from './types';

// ============================================================================
// Schemas
// ============================================================================

export const lengthUnitSchema = z.enum(['inch', 'foot', 'mm', 'cm', 'm']) satisfies z.ZodType<LengthUnit>;

const extentsSchema = z.object({
  width: z.number().finite(),
  height: z.number().finite(),
  depth: z.number().finite(),
});

const definitionSchema = z.object({
  name: z.string().nullable().optional(),
  material: z.string().nullable().optional(),
  faceMaterials: z.array(z.string().nullable()).optional(),
});

const partBaseSchema = z.object({
  bounds: extentsSchema,
  material: z.string().nullable().optional(),
  tag: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  definition: definitionSchema.optional(),
});

const partObjectSchema = z.discriminatedUnion('kind', [
  partBaseSchema.extend({ kind: z.literal('group') }),
  partBaseSchema.extend({ kind: z.literal('component') }),
]);

const PART_KINDS = new Set(['group', 'component']);

const rawObjectSchema = z
  .object({ kind: z.string().min(1, 'kind must not be empty') })
  .passthrough()
  .transform((value, ctx): RawObject => {
    if (!PART_KINDS.has(value.kind)) {
      return { kind: value.kind };
    }

    const parsed = partObjectSchema.safeParse(value);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

export const sceneSchema = z.object({
  unit: lengthUnitSchema.optional(),
  selection: z.array(rawObjectSchema),
});

export type Scene = z.infer<typeof sceneSchema>;

export type SceneParseResult =
  | { success: true; data: Scene }
  | { success: false; errors: string[] };

// ============================================================================
// Parsing
// ============================================================================

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseScene(input: unknown): SceneParseResult {
  const parsed = sceneSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, errors: formatIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

/**
 * Parses the text of a scene dump file.
 */
export function parseSceneJson(content: string): SceneParseResult {
  let input: unknown;
  try {
    input = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, errors: [`Invalid JSON: ${message}`] };
  }
  return parseScene(input);
}
