/**
 * Dimension Solver Tests
 */

import {
  snapToModule,
  ceilToModule,
  isModuleAligned,
  dimensionsForRatio,
  solveWithPolicy,
  solveDimensions
} from './dimension-solver';
import { DEFAULT_POLICY_TABLE } from './constants';
import { RoomType, MassedRoomType } from './types';

const policyFor = (type: RoomType) => DEFAULT_POLICY_TABLE[type];

describe('module helpers', () => {
  it('should snap to the nearest module with halves rounding up', () => {
    expect(snapToModule(225, 150)).toBe(300);
    expect(snapToModule(224, 150)).toBe(150);
    expect(snapToModule(612.4, 50)).toBe(600);
  });

  it('should never snap below one module', () => {
    expect(snapToModule(10, 50)).toBe(50);
  });

  it('should round minimum walls up to the module', () => {
    expect(ceilToModule(240, 150)).toBe(300);
    expect(ceilToModule(240, 50)).toBe(250);
    expect(ceilToModule(250, 50)).toBe(250);
  });

  it('should check alignment', () => {
    expect(isModuleAligned(450, 150)).toBe(true);
    expect(isModuleAligned(500, 150)).toBe(false);
    expect(isModuleAligned(0, 150)).toBe(false);
  });
});

describe('solveWithPolicy', () => {
  it('should pick the ratio with the lowest area error', () => {
    // 4:3 and 3:2 snap to 750x450 (aspect 1.67 > 1.5); 5:4 gives 600x600
    const living = solveWithPolicy(35.5, policyFor(RoomType.Living), 150);
    expect(living).toEqual({ widthCm: 600, depthCm: 600, ratio: [5, 4], degraded: false });

    const kitchen = solveWithPolicy(18, policyFor(RoomType.Kitchen), 150);
    expect(kitchen).toEqual({ widthCm: 600, depthCm: 300, ratio: [5, 3], degraded: false });

    const bedroom = solveWithPolicy(22, policyFor(RoomType.Bedroom), 150);
    expect(bedroom).toEqual({ widthCm: 450, depthCm: 450, ratio: [5, 4], degraded: false });
  });

  it('should keep the earliest ratio on equal error', () => {
    // 3:2 and 5:4 both give 300x300
    const bathroom = solveWithPolicy(8.5, policyFor(RoomType.Bathroom), 150);
    expect(bathroom).toEqual({ widthCm: 300, depthCm: 300, ratio: [3, 2], degraded: false });
  });

  it('should raise short walls to the type minimum', () => {
    // Minimum 120cm rounds up to 150cm on a 50cm module
    const closet = solveWithPolicy(1, policyFor(RoomType.Bathroom), 50);
    expect(closet).toEqual({ widthCm: 150, depthCm: 150, ratio: [3, 2], degraded: false });
  });

  it('should return null when every ratio breaks the aspect range', () => {
    // Every living ratio snaps to 600x300 on a 300cm module
    expect(solveWithPolicy(20, policyFor(RoomType.Living), 300)).toBeNull();
  });
});

describe('dimensionsForRatio', () => {
  it('should recompute the long side from the raised short side', () => {
    // 2:1 on 1m2 gives 150x50; depth is raised to 150 and width stays at least 150
    expect(dimensionsForRatio(10000, [2, 1], 50, 120)).toEqual([150, 150]);
  });
});

describe('solveDimensions', () => {
  it('should fall back to the generic first ratio and flag the result', () => {
    const solved = solveDimensions(20, policyFor(RoomType.Living), 300, DEFAULT_POLICY_TABLE);

    expect(solved).toEqual({ widthCm: 600, depthCm: 300, ratio: [3, 2], degraded: true });
  });

  it('should return module multiples above the type minimum for any valid area', () => {
    const types: MassedRoomType[] = [
      RoomType.Living,
      RoomType.Bedroom,
      RoomType.Kitchen,
      RoomType.Bathroom,
      RoomType.Office,
      RoomType.Utility,
      RoomType.Unclassified
    ];
    const areas = [0.5, 2, 4.2, 7.5, 11, 16.8, 25, 40, 65];
    const modules = [50, 60, 100, 120, 150, 200, 300];

    for (const type of types) {
      const policy = policyFor(type);
      for (const area of areas) {
        for (const moduleCm of modules) {
          const { widthCm, depthCm, degraded } = solveDimensions(area, policy, moduleCm, DEFAULT_POLICY_TABLE);

          expect(widthCm % moduleCm).toBe(0);
          expect(depthCm % moduleCm).toBe(0);
          expect(widthCm).toBeGreaterThanOrEqual(policy.minWallCm);
          expect(depthCm).toBeGreaterThanOrEqual(policy.minWallCm);

          if (!degraded) {
            const aspect = Math.max(widthCm, depthCm) / Math.min(widthCm, depthCm);
            expect(aspect).toBeGreaterThanOrEqual(policy.aspectMin);
            expect(aspect).toBeLessThanOrEqual(policy.aspectMax);
          }
        }
      }
    }
  });
});
