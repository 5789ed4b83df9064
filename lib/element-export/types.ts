/**
 * Element Export Types
 *
 * Shared type definitions for the element export pipeline: scene handles read
 * from the host, the per-part identity key, and the aggregated report rows.
 */

// =============================================================================
// Units
// =============================================================================

/**
 * Linear unit the host reports bounding-box extents in.
 * The host's internal unit is the inch.
 */
export type LengthUnit = 'inch' | 'foot' | 'mm' | 'cm' | 'm';

// =============================================================================
// Scene Handles
// =============================================================================

/**
 * Axis-aligned bounding box extents, in the host's linear unit.
 */
export interface BoundingBoxExtents {
  width: number;
  height: number;
  depth: number;
}

/**
 * Shared definition behind a group or component instance.
 */
export interface SceneDefinition {
  name?: string | null;
  /** Display name of the definition's own material */
  material?: string | null;
  /** Face materials of the definition's direct sub-entities, null for unpainted faces */
  faceMaterials?: ReadonlyArray<string | null>;
}

interface SceneObjectBase {
  bounds: BoundingBoxExtents;
  /** Display name of the instance material */
  material?: string | null;
  /** Display name of the tag (layer) the object sits on */
  tag?: string | null;
  /** Instance name, used when the object has no tag */
  name?: string | null;
}

export interface GroupObject extends SceneObjectBase {
  kind: 'group';
  definition?: SceneDefinition;
}

export interface ComponentObject extends SceneObjectBase {
  kind: 'component';
  definition?: SceneDefinition;
}

/**
 * Any other selected entity (faces, edges, guides...). Never reaches the aggregator.
 */
export interface OtherObject {
  kind: string;
}

/** Objects the pipeline counts as parts */
export type PartObject = GroupObject | ComponentObject;

/** One entry of the host selection */
export type RawObject = PartObject | OtherObject;

// =============================================================================
// Part Identity
// =============================================================================

/**
 * Rounded panel dimensions in mm. Always thickness_mm <= width_mm <= length_mm.
 */
export interface Dimensions {
  thickness_mm: number;
  width_mm: number;
  length_mm: number;
}

/**
 * Edge banding flags, one per reserved marker material (color a01..a04).
 */
export interface EdgeBanding {
  eb1: boolean;
  eb2: boolean;
  eb3: boolean;
  eb4: boolean;
}

/**
 * Identity of a part. Two objects are the same part iff every field matches.
 */
export interface PartKey extends Dimensions, EdgeBanding {
  name: string;
}

/**
 * Aggregate for one PartKey. Key fields are frozen at first insertion.
 */
export interface PartRecord extends PartKey {
  count: number;
}

/**
 * Finalized row of the report.
 */
export type ReportRow = Readonly<PartRecord>;

// =============================================================================
// Serialization
// =============================================================================

/**
 * How names containing CSV control characters are written.
 * - 'quote': wrap in double quotes, doubling inner quotes
 * - 'reject': throw ReportFormatError
 * - 'preserve': write verbatim
 */
export type NameEscaping = 'quote' | 'reject' | 'preserve';

export interface ExportOptions {
  /** Unit of the bounding-box extents (default: 'inch') */
  unit?: LengthUnit;
  /** Handling of names with commas, quotes or line breaks (default: 'quote') */
  nameEscaping?: NameEscaping;
}

export interface ExportResult {
  /** Complete CSV text, header included */
  csv: string;
  /** Sorted report rows */
  rows: ReportRow[];
  /** Number of group/component objects aggregated */
  processed: number;
  /** Number of selected objects of any other kind */
  skipped: number;
}
