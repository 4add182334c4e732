/**
 * Room Type Classifier
 *
 * Maps a free-text room name to a RoomType by keyword substring matching.
 * Keyword lists (English, Portuguese, Spanish) live in data/room-keywords.json
 * and are checked in CLASSIFIER_PRIORITY order; the first hit wins.
 */

import { z } from 'zod';
import { RoomType } from './types';
import { CLASSIFIER_PRIORITY } from './constants';
import keywordData from './data/room-keywords.json';

const KeywordTableSchema = z.object({
  [RoomType.Circulation]: z.array(z.string().min(1)),
  [RoomType.Living]: z.array(z.string().min(1)),
  [RoomType.Bedroom]: z.array(z.string().min(1)),
  [RoomType.Kitchen]: z.array(z.string().min(1)),
  [RoomType.Bathroom]: z.array(z.string().min(1)),
  [RoomType.Office]: z.array(z.string().min(1)),
  [RoomType.Utility]: z.array(z.string().min(1))
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

/**
 * Lower-case, strip diacritics, turn punctuation into spaces and collapse
 * whitespace. "Dormitório_Master" -> "dormitorio master".
 */
export const normalizeRoomName = (name: string): string =>
  name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();

/**
 * Ordered (type, keywords) pairs with keywords pre-normalized.
 */
const buildKeywordIndex = (table: KeywordTable): Array<[RoomType, string[]]> => {
  const lookup: Partial<Record<RoomType, string[]>> = table;
  return CLASSIFIER_PRIORITY.map((type): [RoomType, string[]] => [
    type,
    (lookup[type] ?? []).map(normalizeRoomName)
  ]);
};

const KEYWORD_INDEX = buildKeywordIndex(KeywordTableSchema.parse(keywordData));

/**
 * Classify a room name. Total: unmatched names are `Unclassified`.
 */
export function classifyRoom(name: string): RoomType {
  const normalized = normalizeRoomName(name);
  if (normalized.length === 0) return RoomType.Unclassified;

  for (const [type, keywords] of KEYWORD_INDEX) {
    if (keywords.some(keyword => normalized.includes(keyword))) {
      return type;
    }
  }
  return RoomType.Unclassified;
}

/**
 * Keywords checked for a type, normalized. Empty for `Unclassified`.
 */
export function getRoomKeywords(type: RoomType): readonly string[] {
  const entry = KEYWORD_INDEX.find(([t]) => t === type);
  return entry ? entry[1] : [];
}
