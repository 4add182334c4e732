/**
 * Program Massing - Algorithm Module
 *
 * Exports all public APIs for room dimensioning
 */

// Types - use 'export type' for type-only exports
export { RoomType } from './types';
export type {
  MassedRoomType,
  RoomCategory,
  RgbColor,
  Ratio,
  ProportionPolicy,
  PolicyTable,
  RawRoomRow,
  RoomInput,
  ClassifiedRoom,
  SolvedDimensions,
  RoomResult,
  WallLengthHistogram,
  OptimizationChange,
  OptimizationReport,
  MassingRecord,
  CommonWallLength,
  WallSharingStats,
  MassingIssueCode,
  MassingIssue,
  MassingConfig,
  MassingResult
} from './types';

// Constants
export {
  CM2_PER_M2,
  DEFAULT_POLICY_TABLE,
  CLASSIFIER_PRIORITY,
  ROOM_CATEGORIES,
  CATEGORY_COLORS,
  DEFAULT_MODULE_CM,
  DEFAULT_HEIGHT_CM,
  DEFAULT_AREA_TOLERANCE,
  DEFAULT_MAX_PASSES,
  MODULE_RANGE_CM,
  MIN_WALL_RANGE_CM,
  MODULE_CANDIDATES_CM
} from './constants';

// Configuration
export { resolveConfig, MassingConfigError } from './config';

// Classifier & policies
export { classifyRoom, normalizeRoomName, getRoomKeywords } from './classifier';
export { aspectOf, isWithinAspect, satisfiesPolicy, getPolicy } from './proportion-policy';

// Solver & optimizer
export { solveDimensions, solveWithPolicy, snapToModule, ceilToModule } from './dimension-solver';
export { optimizeGrid, buildHistogram, countSharedLengths } from './grid-optimizer';
export type { OptimizerOptions } from './grid-optimizer';

// Records & reporting
export { parseRoomRows } from './input';
export { emitMassingRecords, excludeCirculation, getRoomCategory } from './massing';
export { findOptimalModule, suggestModule } from './module-search';
export type { ModuleScore, ModuleSearchResult, ModuleSearchOptions } from './module-search';
export { analyzeWallSharing, formatMassingSummary } from './wall-stats';
export { generateMassing } from './pipeline';
