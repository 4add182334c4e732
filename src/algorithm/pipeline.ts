/**
 * Massing Pipeline
 *
 * rows -> validate -> classify -> drop circulation -> solve -> optimize -> emit
 *
 * Synchronous and pure apart from logging. Only an invalid configuration
 * throws; every row- or room-level problem becomes a MassingIssue.
 */

import { RawRoomRow, MassingConfig, MassingIssue, MassingResult, RoomResult } from './types';
import { SMALL_ROOM_AREA_M2 } from './constants';
import { resolveConfig } from './config';
import { parseRoomRows } from './input';
import { classifyRoom } from './classifier';
import { getPolicy } from './proportion-policy';
import { solveDimensions } from './dimension-solver';
import { optimizeGrid } from './grid-optimizer';
import { excludeCirculation, createRoomResult, emitMassingRecords, areaDeviation } from './massing';
import { analyzeWallSharing } from './wall-stats';
import { Logger } from './utils/logger';

const warn = (issues: MassingIssue[], issue: Omit<MassingIssue, 'severity'>): void => {
  Logger.warn(issue.message);
  issues.push({ ...issue, severity: 'warning' });
};

/**
 * Dimension a room program.
 *
 * @param rows - Raw (name, area m2) rows in program order
 * @param overrides - Configuration merged over the defaults
 * @throws {MassingConfigError} If the resolved configuration is invalid
 */
export function generateMassing(
  rows: readonly RawRoomRow[],
  overrides: Partial<MassingConfig> = {}
): MassingResult {
  const config = resolveConfig(overrides);
  Logger.info(`Generating massing for ${rows.length} row(s) on a ${config.moduleCm}cm module`);

  const { rooms, issues } = parseRoomRows(rows);
  for (const issue of issues) {
    Logger.warn(issue.message);
  }

  const classified = rooms.map(room => ({ ...room, type: classifyRoom(room.name) }));
  classified.forEach(room => Logger.debug(` ${room.name} -> [${room.type}]`));

  const { massed, excluded } = excludeCirculation(classified);
  if (excluded > 0) {
    Logger.info(`Skipped ${excluded} circulation room(s)`);
  }

  const results: RoomResult[] = massed.map(room => {
    if (room.areaM2 < SMALL_ROOM_AREA_M2) {
      warn(issues, {
        code: 'SMALL_ROOM',
        roomName: room.name,
        message: `Room '${room.name}' is very small (${room.areaM2.toFixed(1)}m2)`
      });
    }

    Logger.debug(` Solving ${room.name} (${room.areaM2}m2, ${room.type})`);
    const solved = solveDimensions(
      room.areaM2,
      getPolicy(config.policies, room.type),
      config.moduleCm,
      config.policies
    );

    if (solved.degraded) {
      warn(issues, {
        code: 'NO_ACCEPTABLE_PROPORTION',
        roomName: room.name,
        message: `Room '${room.name}' has no acceptable ${room.type} proportion on a ${config.moduleCm}cm module; using generic ${solved.ratio[0]}:${solved.ratio[1]}`
      });
    }

    return createRoomResult(room, solved, config.heightCm);
  });

  const optimization = optimizeGrid(results, config);

  for (const result of results) {
    const deviation = areaDeviation(result);
    if (deviation > config.areaTolerance) {
      warn(issues, {
        code: 'AREA_TOLERANCE_EXCEEDED',
        roomName: result.name,
        message: `Room '${result.name}' is ${(deviation * 100).toFixed(1)}% off its target area`
      });
    }
  }

  const records = emitMassingRecords(results, config.areaTolerance);
  const stats = analyzeWallSharing(records);

  Logger.info(`Generated ${records.length} record(s), ${stats.uniqueLengths} unique wall length(s), ${issues.length} issue(s)`);

  return { records, issues, excludedCirculation: excluded, optimization, stats, config };
}
