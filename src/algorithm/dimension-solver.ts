/**
 * Dimension Solver
 *
 * Produces the initial width/depth of a single room from its target area
 * and proportion policy. Every result is a positive multiple of the module
 * and at least the policy's minimum wall. Rooms are solved independently;
 * wall sharing across rooms is the grid optimizer's job.
 *
 * Per ratio w:d, in listed order:
 *   1. ideal width = sqrt(area * w/d), ideal depth = area / width
 *   2. snap both to the nearest module multiple (half rounds up)
 *   3. raise a short side to the snapped minimum wall and recompute the other
 *   4. reject if the aspect leaves the policy range
 *   5. score by absolute area error; the earlier ratio wins ties
 */

import { ProportionPolicy, PolicyTable, Ratio, SolvedDimensions } from './types';
import { CM2_PER_M2 } from './constants';
import { aspectOf, isWithinAspect, getFallbackPolicy } from './proportion-policy';
import { Logger } from './utils/logger';

// ============================================================================
// Module Helpers
// ============================================================================

/**
 * Nearest module multiple, half rounding up. Never below one module.
 */
export const snapToModule = (value: number, moduleCm: number): number =>
  Math.max(Math.round(value / moduleCm), 1) * moduleCm;

/**
 * Smallest module multiple >= value.
 */
export const ceilToModule = (value: number, moduleCm: number): number =>
  Math.max(Math.ceil(value / moduleCm), 1) * moduleCm;

export const isModuleAligned = (value: number, moduleCm: number): boolean =>
  value > 0 && value % moduleCm === 0;

// ============================================================================
// Candidate Evaluation
// ============================================================================

interface RatioCandidate {
  widthCm: number;
  depthCm: number;
  ratio: Ratio;
  areaError: number;
}

/**
 * Snap one ratio to the module and correct for the minimum wall.
 * Returns dimensions without checking aspect.
 */
export const dimensionsForRatio = (
  areaCm2: number,
  ratio: Ratio,
  moduleCm: number,
  minWallCm: number
): [number, number] => {
  const [rw, rd] = ratio;
  const idealWidth = Math.sqrt(areaCm2 * rw / rd);
  const idealDepth = areaCm2 / idealWidth;

  let width = snapToModule(idealWidth, moduleCm);
  let depth = snapToModule(idealDepth, moduleCm);

  if (width < minWallCm || depth < minWallCm) {
    const raised = ceilToModule(minWallCm, moduleCm);
    // The other side may still fall short for very small rooms
    const other = Math.max(snapToModule(areaCm2 / raised, moduleCm), raised);
    if (width <= depth) {
      width = raised;
      depth = other;
    } else {
      depth = raised;
      width = other;
    }
  }

  return [width, depth];
};

const evaluateRatio = (
  areaCm2: number,
  ratio: Ratio,
  policy: ProportionPolicy,
  moduleCm: number
): RatioCandidate | null => {
  const [widthCm, depthCm] = dimensionsForRatio(areaCm2, ratio, moduleCm, policy.minWallCm);

  if (!isWithinAspect(policy, widthCm, depthCm)) {
    Logger.debug(`   ${ratio[0]}:${ratio[1]} -> ${widthCm}x${depthCm}cm rejected (aspect ${aspectOf(widthCm, depthCm).toFixed(2)})`);
    return null;
  }

  const areaError = Math.abs(widthCm * depthCm - areaCm2);
  Logger.debug(`   ${ratio[0]}:${ratio[1]} -> ${widthCm}x${depthCm}cm, error=${areaError.toFixed(0)}cm2`);
  return { widthCm, depthCm, ratio, areaError };
};

// ============================================================================
// Solver
// ============================================================================

/**
 * Solve a room against its own policy only. Returns null when every ratio
 * violates the aspect range after minimum-wall correction.
 */
export function solveWithPolicy(
  areaM2: number,
  policy: ProportionPolicy,
  moduleCm: number
): SolvedDimensions | null {
  const areaCm2 = areaM2 * CM2_PER_M2;
  let best: RatioCandidate | null = null;

  for (const ratio of policy.ratios) {
    const candidate = evaluateRatio(areaCm2, ratio, policy, moduleCm);
    // Strict comparison keeps the earliest ratio on ties
    if (candidate && (best === null || candidate.areaError < best.areaError)) {
      best = candidate;
    }
  }

  if (!best) return null;
  return { widthCm: best.widthCm, depthCm: best.depthCm, ratio: best.ratio, degraded: false };
}

/**
 * Solve a room, falling back to the generic policy's first ratio when no
 * ratio of its own policy is acceptable. The fallback keeps the room's own
 * minimum wall, ignores aspect, and is marked `degraded`.
 */
export function solveDimensions(
  areaM2: number,
  policy: ProportionPolicy,
  moduleCm: number,
  policies: PolicyTable
): SolvedDimensions {
  const solved = solveWithPolicy(areaM2, policy, moduleCm);
  if (solved) return solved;

  const fallbackRatio = getFallbackPolicy(policies).ratios[0];
  const [widthCm, depthCm] = dimensionsForRatio(
    areaM2 * CM2_PER_M2,
    fallbackRatio,
    moduleCm,
    policy.minWallCm
  );
  Logger.debug(`   no acceptable ratio, fallback ${fallbackRatio[0]}:${fallbackRatio[1]} -> ${widthCm}x${depthCm}cm`);
  return { widthCm, depthCm, ratio: fallbackRatio, degraded: true };
}
