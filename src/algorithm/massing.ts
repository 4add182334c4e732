/**
 * Massing Records
 *
 * Assembles the final per-room tuples handed to the external geometry and
 * label generator, and owns the rule that circulation is never massed.
 */

import {
  RoomType,
  MassedRoomType,
  RoomCategory,
  RgbColor,
  ClassifiedRoom,
  SolvedDimensions,
  RoomResult,
  MassingRecord
} from './types';
import { ROOM_CATEGORIES, CATEGORY_COLORS, CM2_PER_M2 } from './constants';

export type MassedRoom = ClassifiedRoom & { type: MassedRoomType };

export const getRoomCategory = (type: MassedRoomType): RoomCategory => ROOM_CATEGORIES[type];

export const getCategoryColor = (category: RoomCategory): RgbColor => ({ ...CATEGORY_COLORS[category] });

export const isMassedRoom = (room: ClassifiedRoom): room is MassedRoom =>
  room.type !== RoomType.Circulation;

/**
 * Split classified rooms into those that get geometry and the number of
 * circulation rooms dropped.
 */
export function excludeCirculation(rooms: readonly ClassifiedRoom[]): {
  massed: MassedRoom[];
  excluded: number;
} {
  const massed = rooms.filter(isMassedRoom);
  return { massed, excluded: rooms.length - massed.length };
}

export function createRoomResult(
  room: MassedRoom,
  solved: SolvedDimensions,
  heightCm: number
): RoomResult {
  return {
    name: room.name,
    type: room.type,
    widthCm: solved.widthCm,
    depthCm: solved.depthCm,
    targetAreaCm2: room.areaM2 * CM2_PER_M2,
    heightCm,
    degraded: solved.degraded,
    optimized: false
  };
}

/**
 * Relative deviation of a room's area from its target.
 */
export const areaDeviation = (room: Pick<RoomResult, 'widthCm' | 'depthCm' | 'targetAreaCm2'>): number =>
  Math.abs(room.widthCm * room.depthCm - room.targetAreaCm2) / room.targetAreaCm2;

/**
 * Freeze results into records. Input order is kept.
 */
export function emitMassingRecords(
  results: readonly RoomResult[],
  areaTolerance: number
): MassingRecord[] {
  return results.map(result => {
    const category = getRoomCategory(result.type);
    const areaCm2 = result.widthCm * result.depthCm;
    return Object.freeze({
      name: result.name,
      type: result.type,
      category,
      color: getCategoryColor(category),
      widthCm: result.widthCm,
      depthCm: result.depthCm,
      heightCm: result.heightCm,
      areaCm2,
      areaM2: areaCm2 / CM2_PER_M2,
      targetAreaCm2: result.targetAreaCm2,
      degraded: result.degraded,
      withinTolerance: areaDeviation(result) <= areaTolerance
    });
  });
}
