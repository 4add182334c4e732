/**
 * Proportion Policy Tests
 */

import {
  aspectOf,
  normalizedRatio,
  isWithinAspect,
  satisfiesPolicy,
  getFallbackPolicy,
  PolicyTableSchema,
  ProportionPolicySchema
} from './proportion-policy';
import { DEFAULT_POLICY_TABLE } from './constants';
import { RoomType } from './types';

describe('aspectOf', () => {
  it('should always divide the longer side by the shorter', () => {
    expect(aspectOf(300, 600)).toBe(2);
    expect(aspectOf(600, 300)).toBe(2);
    expect(normalizedRatio([3, 4])).toBeCloseTo(4 / 3, 10);
  });
});

describe('isWithinAspect / satisfiesPolicy', () => {
  const living = DEFAULT_POLICY_TABLE[RoomType.Living];

  it('should accept shapes inside the aspect range', () => {
    expect(isWithinAspect(living, 600, 400)).toBe(true);
    expect(isWithinAspect(living, 750, 450)).toBe(false);
  });

  it('should reject walls below the type minimum', () => {
    expect(satisfiesPolicy(living, 300, 300)).toBe(true);
    expect(satisfiesPolicy(living, 300, 200)).toBe(false);
  });

  it('should use the unclassified policy as fallback', () => {
    expect(getFallbackPolicy(DEFAULT_POLICY_TABLE)).toBe(DEFAULT_POLICY_TABLE[RoomType.Unclassified]);
  });
});

describe('PolicyTableSchema', () => {
  it('should accept the default table', () => {
    expect(PolicyTableSchema.safeParse(DEFAULT_POLICY_TABLE).success).toBe(true);
  });

  it('should reject a range that excludes 1', () => {
    const result = ProportionPolicySchema.safeParse({
      ratios: [[3, 2]],
      aspectMin: 1.2,
      aspectMax: 2,
      minWallCm: 150
    });
    expect(result.success).toBe(false);
  });

  it('should reject ratios beyond aspectMax and out-of-range minimum walls', () => {
    expect(ProportionPolicySchema.safeParse({
      ratios: [[3, 1]],
      aspectMin: 0.5,
      aspectMax: 2,
      minWallCm: 150
    }).success).toBe(false);

    expect(ProportionPolicySchema.safeParse({
      ratios: [[3, 2]],
      aspectMin: 0.5,
      aspectMax: 2,
      minWallCm: 90
    }).success).toBe(false);
  });
});
