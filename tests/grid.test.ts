import { describe, it, expect } from 'vitest';
import {
  createLocation,
  formatLocation,
  locationsEqual,
  manhattanDistance,
  parseLocation,
  roundHalfEven,
  travelTime
} from '../src/utils/grid';
import { ParseError } from '../src/models/errors';
import { at } from './factories';

describe('grid', () => {
  describe('createLocation', () => {
    it('should build a frozen location', () => {
      const location = createLocation(3, 4);
      expect(location).toEqual({ row: 3, col: 4 });
      expect(Object.isFrozen(location)).toBe(true);
    });

    it('should reject negative or fractional coordinates', () => {
      expect(() => createLocation(-1, 0)).toThrow(ParseError);
      expect(() => createLocation(0, 1.5)).toThrow('Location (0,1.5) must use non-negative integers');
    });
  });

  describe('locationsEqual', () => {
    it('should compare by coordinates', () => {
      expect(locationsEqual(at(1, 2), at(1, 2))).toBe(true);
      expect(locationsEqual(at(1, 2), at(2, 1))).toBe(false);
    });

    it('should treat null as equal only to null', () => {
      expect(locationsEqual(null, null)).toBe(true);
      expect(locationsEqual(null, at(0, 0))).toBe(false);
      expect(locationsEqual(at(0, 0), null)).toBe(false);
    });
  });

  describe('manhattanDistance', () => {
    it('should sum row and column differences', () => {
      expect(manhattanDistance(at(1, 1), at(6, 6))).toBe(10);
      expect(manhattanDistance(at(0, 5), at(3, 1))).toBe(7);
    });

    it('should be symmetric and zero for the same cell', () => {
      expect(manhattanDistance(at(2, 9), at(7, 4))).toBe(manhattanDistance(at(7, 4), at(2, 9)));
      expect(manhattanDistance(at(4, 4), at(4, 4))).toBe(0);
    });
  });

  describe('roundHalfEven', () => {
    it('should send exact halves to the even neighbour', () => {
      expect(roundHalfEven(0.5)).toBe(0);
      expect(roundHalfEven(1.5)).toBe(2);
      expect(roundHalfEven(2.5)).toBe(2);
      expect(roundHalfEven(3.5)).toBe(4);
    });

    it('should round everything else to the nearest integer', () => {
      expect(roundHalfEven(2.4)).toBe(2);
      expect(roundHalfEven(2.6)).toBe(3);
      expect(roundHalfEven(7)).toBe(7);
    });
  });

  describe('travelTime', () => {
    it('should divide distance by speed and round', () => {
      expect(travelTime(at(1, 1), at(6, 6), 2)).toBe(5);
      expect(travelTime(at(1, 1), at(4, 4), 2)).toBe(3);
      expect(travelTime(at(1, 1), at(1, 2), 2)).toBe(0);
    });

    it('should be zero for speed zero or an unknown end', () => {
      expect(travelTime(at(0, 0), at(9, 9), 0)).toBe(0);
      expect(travelTime(null, at(9, 9), 3)).toBe(0);
      expect(travelTime(at(9, 9), null, 3)).toBe(0);
    });
  });

  describe('text form', () => {
    it('should parse row,col tokens', () => {
      expect(parseLocation('12,0')).toEqual({ row: 12, col: 0 });
    });

    it('should reject anything that is not row,col', () => {
      expect(() => parseLocation('1, 2')).toThrow('Malformed location "1, 2", expected row,col');
      expect(() => parseLocation('-1,2')).toThrow(ParseError);
      expect(() => parseLocation('1,2,3')).toThrow(ParseError);
    });

    it('should format locations and the missing location', () => {
      expect(formatLocation(at(3, 7))).toBe('(3,7)');
      expect(formatLocation(null)).toBe('(none)');
    });
  });
});
