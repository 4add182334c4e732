/**
 * Program Row Validation
 *
 * Turns raw tabular rows into RoomInput values. Bad rows are reported as
 * INVALID_INPUT_ROW issues and skipped; they never abort the batch.
 */

import { z } from 'zod';
import { RawRoomRow, RoomInput, MassingIssue } from './types';
import { formatZodIssues } from './config';

/**
 * Accepts numbers or numeric strings; a decimal comma ("18,5") is read as a point.
 */
const AreaSchema = z.preprocess(
  value =>
    typeof value === 'string' && value.trim() !== ''
      ? Number(value.trim().replace(',', '.'))
      : value,
  z
    .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite('must be a number')
    .positive('must be greater than 0')
);

export const RoomInputSchema = z.object({
  name: z
    .string({ required_error: 'is required', invalid_type_error: 'must be text' })
    .trim()
    .min(1, 'must not be empty'),
  area: AreaSchema
});

export interface ParsedRows {
  rooms: RoomInput[];
  issues: MassingIssue[];
}

/**
 * Validate rows in order. Row numbers in issues are 1-based.
 */
export function parseRoomRows(rows: readonly RawRoomRow[]): ParsedRows {
  const rooms: RoomInput[] = [];
  const issues: MassingIssue[] = [];

  rows.forEach((raw, index) => {
    const row = index + 1;
    const parsed = RoomInputSchema.safeParse(raw);

    if (!parsed.success) {
      issues.push({
        code: 'INVALID_INPUT_ROW',
        severity: 'skip',
        row,
        roomName: typeof raw.name === 'string' && raw.name.trim() !== '' ? raw.name.trim() : undefined,
        message: `Row ${row} skipped: ${formatZodIssues(parsed.error)}`
      });
      return;
    }

    rooms.push({ name: parsed.data.name, areaM2: parsed.data.area });
  });

  return { rooms, issues };
}
