/**
 * Program Massing - Algorithm Types
 * Types for the room dimensioning and wall-sharing algorithm
 *
 * ALL LENGTHS ARE IN CENTIMETERS and all areas in square centimeters,
 * except where a field name says otherwise (`areaM2`).
 */

// ============================================================================
// ROOM TYPES
// ============================================================================

/**
 * Closed set of room categories recognized by the classifier.
 *
 * `Circulation` rooms are never massed. `Unclassified` uses the
 * generic proportion policy.
 */
export enum RoomType {
  Living = 'living',
  Bedroom = 'bedroom',
  Kitchen = 'kitchen',
  Bathroom = 'bathroom',
  Office = 'office',
  Circulation = 'circulation',
  Utility = 'utility',
  Unclassified = 'unclassified'
}

/**
 * Room types that produce geometry.
 */
export type MassedRoomType = Exclude<RoomType, RoomType.Circulation>;

/**
 * Color grouping handed to the external renderer.
 */
export type RoomCategory = 'public' | 'private' | 'service';

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

// ============================================================================
// PROPORTION POLICY
// ============================================================================

/**
 * Width:depth ratio, e.g. `[4, 3]`.
 */
export type Ratio = readonly [number, number];

export interface ProportionPolicy {
  ratios: readonly Ratio[];      // Tried in listed order; earlier wins ties
  aspectMin: number;             // Lower bound on max(w,d)/min(w,d), always <= 1 in the defaults
  aspectMax: number;             // Upper bound on max(w,d)/min(w,d)
  minWallCm: number;             // Shortest acceptable wall for this type
}

export type PolicyTable = Readonly<Record<RoomType, ProportionPolicy>>;

// ============================================================================
// INPUT
// ============================================================================

/**
 * A row as it arrives from the tabular source, before validation.
 * Area may still be a string ("18,5", "22").
 */
export interface RawRoomRow {
  name?: unknown;
  area?: unknown;
}

/**
 * A validated program row.
 */
export interface RoomInput {
  name: string;
  areaM2: number;
}

export interface ClassifiedRoom extends RoomInput {
  type: RoomType;
}

// ============================================================================
// SOLVER / OPTIMIZER
// ============================================================================

export interface SolvedDimensions {
  widthCm: number;
  depthCm: number;
  ratio: Ratio;           // Ratio that produced the result
  degraded: boolean;      // True if the generic fallback was used
}

/**
 * Mutable per-room working record. Width and depth are refined in place
 * by the grid optimizer; everything else is fixed at creation.
 */
export interface RoomResult {
  name: string;
  type: MassedRoomType;
  widthCm: number;
  depthCm: number;
  targetAreaCm2: number;
  heightCm: number;
  degraded: boolean;
  optimized: boolean;
}

/**
 * Wall length (cm) -> number of rooms using it on width or depth.
 */
export type WallLengthHistogram = Map<number, number>;

export interface OptimizationChange {
  pass: number;
  roomName: string;
  before: [number, number];
  after: [number, number];
  targetLengthCm: number;
}

export interface OptimizationReport {
  passes: number;
  changes: OptimizationChange[];
  converged: boolean;
}

// ============================================================================
// OUTPUT
// ============================================================================

/**
 * Final per-room record consumed by the geometry/label generator.
 */
export interface MassingRecord {
  name: string;
  type: MassedRoomType;
  category: RoomCategory;
  color: RgbColor;
  widthCm: number;
  depthCm: number;
  heightCm: number;
  areaCm2: number;
  areaM2: number;
  targetAreaCm2: number;
  degraded: boolean;
  withinTolerance: boolean;
}

export interface CommonWallLength {
  lengthCm: number;
  count: number;
  rooms: string[];
}

export interface WallSharingStats {
  totalWalls: number;
  uniqueLengths: number;
  sharedWalls: number;
  sharingPercent: number;
  requestedAreaM2: number;
  actualAreaM2: number;
  areaVariancePercent: number;
  commonLengths: CommonWallLength[];
}

// ============================================================================
// ISSUES
// ============================================================================

export type MassingIssueCode =
  | 'INVALID_INPUT_ROW'
  | 'NO_ACCEPTABLE_PROPORTION'
  | 'AREA_TOLERANCE_EXCEEDED'
  | 'SMALL_ROOM';

export interface MassingIssue {
  code: MassingIssueCode;
  severity: 'skip' | 'warning';
  message: string;
  row?: number;           // 1-based index into the input rows
  roomName?: string;
}

// ============================================================================
// CONFIGURATION / PIPELINE
// ============================================================================

export interface MassingConfig {
  moduleCm: number;
  heightCm: number;
  areaTolerance: number;
  maxPasses: number;
  policies: PolicyTable;
}

export interface MassingResult {
  records: MassingRecord[];
  issues: MassingIssue[];
  excludedCirculation: number;
  optimization: OptimizationReport;
  stats: WallSharingStats;
  config: Readonly<MassingConfig>;
}
