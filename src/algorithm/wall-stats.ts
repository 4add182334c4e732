/**
 * Wall Sharing Statistics
 *
 * Summarizes how well a finished set of records shares wall lengths and
 * how far total area drifted from the program. Every room contributes two
 * wall surfaces (width and depth), so a square room counts its side twice.
 */

import { MassingRecord, MassingResult, WallSharingStats, CommonWallLength } from './types';
import { CM2_PER_M2 } from './constants';

const COMMON_LENGTHS_SHOWN = 5;

export function analyzeWallSharing(records: readonly MassingRecord[]): WallSharingStats {
  const counts = new Map<number, number>();
  for (const record of records) {
    for (const length of [record.widthCm, record.depthCm]) {
      counts.set(length, (counts.get(length) ?? 0) + 1);
    }
  }

  const totalWalls = records.length * 2;
  const sharedWalls = [...counts.values()]
    .filter(count => count > 1)
    .reduce((sum, count) => sum + count, 0);

  const requestedAreaM2 = records.reduce((sum, r) => sum + r.targetAreaCm2 / CM2_PER_M2, 0);
  const actualAreaM2 = records.reduce((sum, r) => sum + r.areaM2, 0);

  const commonLengths: CommonWallLength[] = [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0] - b[0])
    .slice(0, COMMON_LENGTHS_SHOWN)
    .map(([lengthCm, count]) => ({
      lengthCm,
      count,
      rooms: records
        .filter(r => r.widthCm === lengthCm || r.depthCm === lengthCm)
        .map(r => r.name)
    }));

  return {
    totalWalls,
    uniqueLengths: counts.size,
    sharedWalls,
    sharingPercent: totalWalls > 0 ? (sharedWalls / totalWalls) * 100 : 0,
    requestedAreaM2,
    actualAreaM2,
    areaVariancePercent: requestedAreaM2 > 0
      ? ((actualAreaM2 - requestedAreaM2) / requestedAreaM2) * 100
      : 0,
    commonLengths
  };
}

const formatSigned = (value: number): string => `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;

/**
 * Plain-text run summary, one line per entry.
 */
export function formatMassingSummary(result: MassingResult): string {
  const { stats, config } = result;
  const lines = [
    'MASSING SUMMARY',
    '='.repeat(50),
    `Module: ${config.moduleCm}cm (${(config.moduleCm / 100).toFixed(2)}m)`,
    `Total rooms: ${result.records.length}`,
    `Unique wall dimensions: ${stats.uniqueLengths}`,
    `Walls in shared dimensions: ${stats.sharedWalls} of ${stats.totalWalls} (${stats.sharingPercent.toFixed(0)}%)`,
    `Requested area: ${stats.requestedAreaM2.toFixed(2)}m2`,
    `Actual area: ${stats.actualAreaM2.toFixed(2)}m2`,
    `Variance: ${formatSigned(stats.areaVariancePercent)}%`,
    `Optimization: ${result.optimization.changes.length} change(s) in ${result.optimization.passes} pass(es)`,
    `Excluded circulation rooms: ${result.excludedCirculation}`,
    `Issues: ${result.issues.length}`
  ];

  if (stats.commonLengths.length > 0) {
    lines.push('', 'Most common dimensions:');
    for (const common of stats.commonLengths) {
      lines.push(`  ${(common.lengthCm / 100).toFixed(2)}m: ${common.count} walls - ${common.rooms.slice(0, 3).join(', ')}`);
    }
  }

  return lines.join('\n');
}
