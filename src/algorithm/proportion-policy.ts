/**
 * Proportion Policy Module
 *
 * Single source of truth for which room shapes are acceptable. The solver
 * consults it for every ratio attempt and the grid optimizer re-validates
 * every candidate substitution against it; neither hardcodes bounds.
 */

import { z } from 'zod';
import { RoomType, ProportionPolicy, PolicyTable, Ratio } from './types';
import { MIN_WALL_RANGE_CM } from './constants';

// ============================================================================
// Shape Helpers
// ============================================================================

/**
 * Aspect of a rectangle as longer side over shorter side (always >= 1).
 */
export const aspectOf = (a: number, b: number): number =>
  Math.max(a, b) / Math.min(a, b);

/**
 * Ratio folded to >= 1, e.g. [3, 4] -> 1.333.
 */
export const normalizedRatio = ([w, d]: Ratio): number => aspectOf(w, d);

export const isWithinAspect = (policy: ProportionPolicy, a: number, b: number): boolean => {
  const aspect = aspectOf(a, b);
  return aspect >= policy.aspectMin && aspect <= policy.aspectMax;
};

/**
 * Checks every constraint a policy places on a finished rectangle,
 * except module alignment which belongs to the caller's module.
 */
export const satisfiesPolicy = (policy: ProportionPolicy, a: number, b: number): boolean =>
  a >= policy.minWallCm && b >= policy.minWallCm && isWithinAspect(policy, a, b);

export const getPolicy = (table: PolicyTable, type: RoomType): ProportionPolicy => table[type];

/**
 * Policy used when a room's own ratios all fail.
 */
export const getFallbackPolicy = (table: PolicyTable): ProportionPolicy =>
  table[RoomType.Unclassified];

// ============================================================================
// Validation
// ============================================================================

const RatioSchema = z.tuple([z.number().positive(), z.number().positive()]);

export const ProportionPolicySchema = z
  .object({
    ratios: z.array(RatioSchema).min(1),
    aspectMin: z.number().positive(),
    aspectMax: z.number().positive(),
    minWallCm: z.number().min(MIN_WALL_RANGE_CM[0]).max(MIN_WALL_RANGE_CM[1])
  })
  .superRefine((policy, ctx) => {
    if (policy.aspectMin > 1 || policy.aspectMax < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `aspect range [${policy.aspectMin}, ${policy.aspectMax}] must contain 1`
      });
    }
    policy.ratios.forEach((ratio, index) => {
      if (normalizedRatio(ratio) > policy.aspectMax) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ratios', index],
          message: `ratio ${ratio[0]}:${ratio[1]} exceeds aspectMax ${policy.aspectMax}`
        });
      }
    });
  });

export const PolicyTableSchema = z.object({
  [RoomType.Living]: ProportionPolicySchema,
  [RoomType.Bedroom]: ProportionPolicySchema,
  [RoomType.Kitchen]: ProportionPolicySchema,
  [RoomType.Bathroom]: ProportionPolicySchema,
  [RoomType.Office]: ProportionPolicySchema,
  [RoomType.Circulation]: ProportionPolicySchema,
  [RoomType.Utility]: ProportionPolicySchema,
  [RoomType.Unclassified]: ProportionPolicySchema
});
