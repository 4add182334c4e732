/**
 * Optimal Module Search
 *
 * Tries every candidate module against the whole program and picks the one
 * that dimensions every room without a degraded fit at the lowest total
 * area error. Ties go to the earlier candidate. Candidates a configuration
 * would reject are ignored.
 */

import { PolicyTable, RawRoomRow } from './types';
import {
  CM2_PER_M2,
  DEFAULT_POLICY_TABLE,
  FALLBACK_MODULE_CM,
  MODULE_CANDIDATES_CM
} from './constants';
import { getPolicy } from './proportion-policy';
import { solveWithPolicy } from './dimension-solver';
import { MassedRoom, excludeCirculation } from './massing';
import { classifyRoom } from './classifier';
import { parseRoomRows } from './input';
import { MassingConfigSchema } from './config';
import { Logger } from './utils/logger';

export interface ModuleScore {
  moduleCm: number;
  totalErrorM2: number;
  averageErrorM2: number;
}

export interface ModuleSearchResult {
  moduleCm: number;
  fallback: boolean;       // True if no candidate worked for every room
  ranked: ModuleScore[];   // Eligible candidates, lowest average error first
}

export interface ModuleSearchOptions {
  candidates?: readonly number[];
  policies?: PolicyTable;
}

/**
 * Total absolute area error (m2) at a module, or null if any room
 * needs the degraded fallback.
 */
const scoreModule = (
  rooms: readonly MassedRoom[],
  moduleCm: number,
  policies: PolicyTable
): number | null => {
  let totalError = 0;
  for (const room of rooms) {
    const solved = solveWithPolicy(room.areaM2, getPolicy(policies, room.type), moduleCm);
    if (!solved) return null;
    totalError += Math.abs(solved.widthCm * solved.depthCm / CM2_PER_M2 - room.areaM2);
  }
  return totalError;
};

export function findOptimalModule(
  rooms: readonly MassedRoom[],
  options: ModuleSearchOptions = {}
): ModuleSearchResult {
  const candidates = (options.candidates ?? MODULE_CANDIDATES_CM).filter(moduleCm => {
    const usable = MassingConfigSchema.shape.moduleCm.safeParse(moduleCm).success;
    if (!usable) {
      Logger.warn(`Ignoring candidate module ${moduleCm}cm: not a whole number in the accepted range`);
    }
    return usable;
  });
  const policies = options.policies ?? DEFAULT_POLICY_TABLE;

  if (rooms.length === 0) {
    Logger.warn(`No rooms to size; using fallback module ${FALLBACK_MODULE_CM}cm`);
    return { moduleCm: FALLBACK_MODULE_CM, fallback: true, ranked: [] };
  }

  const eligible: ModuleScore[] = [];
  for (const moduleCm of candidates) {
    const totalErrorM2 = scoreModule(rooms, moduleCm, policies);
    if (totalErrorM2 === null) {
      Logger.debug(` module ${moduleCm}cm: at least one room has no acceptable proportion`);
      continue;
    }
    eligible.push({ moduleCm, totalErrorM2, averageErrorM2: totalErrorM2 / rooms.length });
  }

  if (eligible.length === 0) {
    Logger.warn(`No module fits every room; using fallback module ${FALLBACK_MODULE_CM}cm`);
    return { moduleCm: FALLBACK_MODULE_CM, fallback: true, ranked: [] };
  }

  // Array.prototype.sort is stable, so candidate order breaks ties
  const ranked = [...eligible].sort((a, b) => a.totalErrorM2 - b.totalErrorM2);
  Logger.info(`Selected module ${ranked[0].moduleCm}cm (average error ${ranked[0].averageErrorM2.toFixed(2)}m2)`);
  return { moduleCm: ranked[0].moduleCm, fallback: false, ranked };
}

/**
 * Module search straight from raw rows. Invalid rows and circulation are
 * ignored the same way the pipeline ignores them.
 */
export function suggestModule(
  rows: readonly RawRoomRow[],
  options: ModuleSearchOptions = {}
): ModuleSearchResult {
  const { rooms } = parseRoomRows(rows);
  const { massed } = excludeCirculation(
    rooms.map(room => ({ ...room, type: classifyRoom(room.name) }))
  );
  return findOptimalModule(massed, options);
}
