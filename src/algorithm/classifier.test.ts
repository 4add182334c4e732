/**
 * Classifier Tests
 */

import { classifyRoom, normalizeRoomName, getRoomKeywords } from './classifier';
import { RoomType } from './types';

describe('classifyRoom', () => {
  it('should classify English, Portuguese and Spanish names', () => {
    expect(classifyRoom('Master Bedroom')).toBe(RoomType.Bedroom);
    expect(classifyRoom('Cozinha')).toBe(RoomType.Kitchen);
    expect(classifyRoom('Corredor Principal')).toBe(RoomType.Circulation);
    expect(classifyRoom('Sala de Jantar')).toBe(RoomType.Living);
    expect(classifyRoom('Despensa')).toBe(RoomType.Utility);
    expect(classifyRoom('Powder Room')).toBe(RoomType.Bathroom);
  });

  it('should return unclassified when nothing matches', () => {
    expect(classifyRoom('Xyzzy')).toBe(RoomType.Unclassified);
    expect(classifyRoom('')).toBe(RoomType.Unclassified);
    expect(classifyRoom('   ')).toBe(RoomType.Unclassified);
  });

  it('should check circulation before utility', () => {
    expect(classifyRoom('Hallway Storage')).toBe(RoomType.Circulation);
    expect(classifyRoom('Storage')).toBe(RoomType.Utility);
  });

  it('should ignore case, accents and punctuation', () => {
    expect(classifyRoom('DORMITÓRIO')).toBe(RoomType.Bedroom);
    expect(classifyRoom('home-office')).toBe(RoomType.Office);
    expect(classifyRoom('Baño')).toBe(RoomType.Bathroom);
    expect(classifyRoom('family_room')).toBe(RoomType.Living);
  });
});

describe('normalizeRoomName', () => {
  it('should strip diacritics and collapse separators', () => {
    expect(normalizeRoomName('  Dormitório_Master!! ')).toBe('dormitorio master');
  });
});

describe('getRoomKeywords', () => {
  it('should expose normalized keywords per type', () => {
    expect(getRoomKeywords(RoomType.Kitchen)).toContain('cozinha');
    expect(getRoomKeywords(RoomType.Unclassified)).toEqual([]);
  });
});
