/**
 * Grid Optimizer
 *
 * Greedy local search that nudges rooms onto wall lengths other rooms
 * already use, so volumes can later be packed against each other.
 *
 * Each pass:
 *   - candidate lengths = lengths used by 2+ rooms, by count desc then length asc
 *     (fixed for the pass)
 *   - for every room in input order, the less-used side is replaced by a
 *     candidate and the other side recomputed from the TARGET area
 *   - a substitution must satisfy the room's policy, stay module-aligned and
 *     within the area tolerance of the target, raise the number of shared
 *     (room, edge) pairs, and not lower the number of shared lengths
 *   - among valid substitutions: highest histogram count, then lowest area error
 *
 * Passes repeat until one commits nothing or the pass bound is hit.
 */

import {
  RoomResult,
  MassingConfig,
  WallLengthHistogram,
  OptimizationChange,
  OptimizationReport
} from './types';
import { getPolicy, satisfiesPolicy } from './proportion-policy';
import { snapToModule, isModuleAligned } from './dimension-solver';
import { Logger } from './utils/logger';

export type OptimizerOptions = Pick<MassingConfig, 'moduleCm' | 'areaTolerance' | 'maxPasses' | 'policies'>;

// ============================================================================
// Histogram Helpers
// ============================================================================

/**
 * Distinct wall lengths of a rectangle (a square has one).
 */
export const wallLengths = (widthCm: number, depthCm: number): number[] =>
  widthCm === depthCm ? [widthCm] : [widthCm, depthCm];

export function buildHistogram(rooms: readonly RoomResult[]): WallLengthHistogram {
  const histogram: WallLengthHistogram = new Map();
  for (const room of rooms) {
    for (const length of wallLengths(room.widthCm, room.depthCm)) {
      histogram.set(length, (histogram.get(length) ?? 0) + 1);
    }
  }
  return histogram;
}

/**
 * Number of lengths used by two or more rooms.
 */
export const countSharedLengths = (histogram: WallLengthHistogram): number =>
  [...histogram.values()].filter(count => count >= 2).length;

/**
 * Number of (room, edge) pairs whose length another room also uses.
 */
export const countSharedEdges = (
  rooms: readonly RoomResult[],
  histogram: WallLengthHistogram
): number =>
  rooms.reduce(
    (sum, room) =>
      sum + wallLengths(room.widthCm, room.depthCm).filter(l => (histogram.get(l) ?? 0) >= 2).length,
    0
  );

/**
 * Lengths used by 2+ rooms, most used first, shorter first on ties.
 */
export const getCandidateLengths = (histogram: WallLengthHistogram): number[] =>
  [...histogram.entries()]
    .filter(([, count]) => count >= 2)
    .sort((a, b) => b[1] - a[1] || a[0] - b[0])
    .map(([length]) => length);

const withSubstitution = (
  histogram: WallLengthHistogram,
  removed: number[],
  added: number[]
): WallLengthHistogram => {
  const next = new Map(histogram);
  for (const length of removed) {
    const count = (next.get(length) ?? 0) - 1;
    if (count > 0) {
      next.set(length, count);
    } else {
      next.delete(length);
    }
  }
  for (const length of added) {
    next.set(length, (next.get(length) ?? 0) + 1);
  }
  return next;
};

// ============================================================================
// Substitution Search
// ============================================================================

interface Substitution {
  widthCm: number;
  depthCm: number;
  targetLengthCm: number;
  targetCount: number;
  areaError: number;
  histogram: WallLengthHistogram;
}

const isSameRectangle = (room: RoomResult, widthCm: number, depthCm: number): boolean =>
  (room.widthCm === widthCm && room.depthCm === depthCm) ||
  (room.widthCm === depthCm && room.depthCm === widthCm);

/**
 * Best valid substitution for one room, or null if none improves sharing.
 */
const findSubstitution = (
  rooms: readonly RoomResult[],
  index: number,
  histogram: WallLengthHistogram,
  candidates: readonly number[],
  options: OptimizerOptions
): Substitution | null => {
  const room = rooms[index];
  const policy = getPolicy(options.policies, room.type);
  const replaceWidth = (histogram.get(room.widthCm) ?? 0) < (histogram.get(room.depthCm) ?? 0);

  const sharedLengthsBefore = countSharedLengths(histogram);
  const sharedEdgesBefore = countSharedEdges(rooms, histogram);

  let best: Substitution | null = null;

  for (const target of candidates) {
    const other = snapToModule(room.targetAreaCm2 / target, options.moduleCm);
    const widthCm = replaceWidth ? target : other;
    const depthCm = replaceWidth ? other : target;

    if (isSameRectangle(room, widthCm, depthCm)) continue;
    if (!isModuleAligned(widthCm, options.moduleCm) || !isModuleAligned(depthCm, options.moduleCm)) continue;
    if (!satisfiesPolicy(policy, widthCm, depthCm)) continue;

    const areaError = Math.abs(widthCm * depthCm - room.targetAreaCm2);
    if (areaError / room.targetAreaCm2 > options.areaTolerance) continue;

    const next = withSubstitution(
      histogram,
      wallLengths(room.widthCm, room.depthCm),
      wallLengths(widthCm, depthCm)
    );
    const movedRooms = rooms.map((r, i) => (i === index ? { ...r, widthCm, depthCm } : r));

    if (countSharedLengths(next) < sharedLengthsBefore) continue;
    if (countSharedEdges(movedRooms, next) <= sharedEdgesBefore) continue;

    const targetCount = histogram.get(target) ?? 0;
    const isBetter =
      best === null ||
      targetCount > best.targetCount ||
      (targetCount === best.targetCount && areaError < best.areaError);

    if (isBetter) {
      best = { widthCm, depthCm, targetLengthCm: target, targetCount, areaError, histogram: next };
    }
  }

  return best;
};

// ============================================================================
// Optimizer
// ============================================================================

/**
 * Refine room dimensions in place to increase wall sharing.
 * Order of `rooms` is preserved; only width and depth change.
 */
export function optimizeGrid(rooms: RoomResult[], options: OptimizerOptions): OptimizationReport {
  const changes: OptimizationChange[] = [];
  let histogram = buildHistogram(rooms);
  let passes = 0;
  let converged = false;

  for (let pass = 1; pass <= options.maxPasses; pass++) {
    passes = pass;
    const candidates = getCandidateLengths(histogram);
    Logger.debug(`Pass ${pass}/${options.maxPasses}: candidate lengths ${candidates.join(', ') || '(none)'}`);

    let committed = 0;
    rooms.forEach((room, index) => {
      const substitution = findSubstitution(rooms, index, histogram, candidates, options);
      if (!substitution) return;

      const before: [number, number] = [room.widthCm, room.depthCm];
      room.widthCm = substitution.widthCm;
      room.depthCm = substitution.depthCm;
      room.optimized = true;
      histogram = substitution.histogram;
      committed++;

      changes.push({
        pass,
        roomName: room.name,
        before,
        after: [room.widthCm, room.depthCm],
        targetLengthCm: substitution.targetLengthCm
      });
      Logger.debug(`   ${room.name}: ${before[0]}x${before[1]} -> ${room.widthCm}x${room.depthCm}cm (onto ${substitution.targetLengthCm}cm)`);
    });

    Logger.info(`Pass ${pass}: ${committed} room(s) changed`);
    if (committed === 0) {
      converged = true;
      break;
    }
  }

  if (!converged) {
    Logger.warn(`Grid optimization stopped at the ${options.maxPasses}-pass bound before reaching a fixed point`);
  }

  return { passes, changes, converged };
}
