/**
 * Program Massing - Constants
 * Default values and configuration
 *
 * ALL LENGTHS ARE IN CENTIMETERS
 */

import { RoomType, PolicyTable, RoomCategory, RgbColor, MassedRoomType } from './types';

// Conversion factor
export const CM2_PER_M2 = 10000;

// ============================================================================
// PROPORTION POLICIES
// Preferred width:depth ratios and aspect bounds per room type
// ============================================================================

/**
 * Default policy table. Aspect bounds apply to max(w,d)/min(w,d), so the
 * lower bounds below 1 never reject anything; they are kept so a custom
 * table can force elongated shapes by raising them above 1.
 */
export const DEFAULT_POLICY_TABLE: PolicyTable = {
  [RoomType.Living]: {
    ratios: [[4, 3], [5, 4], [3, 2]],
    aspectMin: 0.6,
    aspectMax: 1.5,
    minWallCm: 240
  },
  [RoomType.Bedroom]: {
    ratios: [[3, 2], [4, 3], [5, 4]],
    aspectMin: 0.5,
    aspectMax: 1.5,
    minWallCm: 240
  },
  [RoomType.Kitchen]: {
    ratios: [[5, 3], [3, 2], [4, 3]],
    aspectMin: 0.5,
    aspectMax: 2.0,
    minWallCm: 180
  },
  [RoomType.Bathroom]: {
    ratios: [[3, 2], [2, 1], [5, 4]],
    aspectMin: 0.4,
    aspectMax: 2.0,
    minWallCm: 120
  },
  [RoomType.Office]: {
    ratios: [[3, 2], [4, 3], [5, 4]],
    aspectMin: 0.6,
    aspectMax: 1.5,
    minWallCm: 200
  },
  [RoomType.Circulation]: {
    ratios: [[2, 1], [3, 1], [5, 2]],
    aspectMin: 0.3,
    aspectMax: 3.0,
    minWallCm: 100
  },
  [RoomType.Utility]: {
    ratios: [[2, 1], [3, 2], [1, 1]],
    aspectMin: 0.4,
    aspectMax: 2.5,
    minWallCm: 100
  },
  [RoomType.Unclassified]: {
    ratios: [[3, 2], [4, 3], [5, 4], [1, 1]],
    aspectMin: 0.5,
    aspectMax: 1.5,
    minWallCm: 120
  }
};

// ============================================================================
// CLASSIFIER
// ============================================================================

/**
 * Order in which keyword lists are checked. Circulation goes first so
 * "Hallway Storage" is a corridor, not a closet.
 */
export const CLASSIFIER_PRIORITY: readonly RoomType[] = [
  RoomType.Circulation,
  RoomType.Living,
  RoomType.Bedroom,
  RoomType.Kitchen,
  RoomType.Bathroom,
  RoomType.Office,
  RoomType.Utility
];

// ============================================================================
// CATEGORIES & COLORS
// ============================================================================

export const ROOM_CATEGORIES: Record<MassedRoomType, RoomCategory> = {
  [RoomType.Living]: 'public',
  [RoomType.Kitchen]: 'public',
  [RoomType.Bedroom]: 'private',
  [RoomType.Bathroom]: 'private',
  [RoomType.Office]: 'private',
  [RoomType.Utility]: 'service',
  [RoomType.Unclassified]: 'public'
};

// Category colors (RGB - values 0-255)
export const CATEGORY_COLORS: Record<RoomCategory, RgbColor> = {
  public: { r: 150, g: 180, b: 255 },   // Light blue
  private: { r: 255, g: 150, b: 150 },  // Light red
  service: { r: 255, g: 255, b: 150 }   // Light yellow
};

// ============================================================================
// DEFAULTS & RANGES
// ============================================================================

export const DEFAULT_MODULE_CM = 50;
export const DEFAULT_HEIGHT_CM = 300;
export const DEFAULT_AREA_TOLERANCE = 0.05;
export const DEFAULT_MAX_PASSES = 3;

export const MODULE_RANGE_CM: readonly [number, number] = [50, 300];
export const MIN_WALL_RANGE_CM: readonly [number, number] = [100, 300];

// Rooms below this are kept but reported
export const SMALL_ROOM_AREA_M2 = 2.0;

// Used when no candidate module fits every room
export const FALLBACK_MODULE_CM = 150;

/**
 * Candidate modules for the optimal-module search:
 * 120-200cm in 10cm steps, then 225-300cm in 25cm steps.
 */
export const MODULE_CANDIDATES_CM: readonly number[] = [
  120, 130, 140, 150, 160, 170, 180, 190, 200,
  225, 250, 275, 300
];
