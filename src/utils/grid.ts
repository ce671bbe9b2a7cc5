/**
 * Grid Utilities
 *
 * Location helpers for the simulation grid:
 * - Building and comparing immutable locations
 * - Manhattan distance between two cells
 * - Travel time for a driver moving at a given speed
 * - Reading and writing the `row,col` text form used in event scripts
 */

import type { Location } from '../models/types';
import { ParseError } from '../models/errors';

// =============================================================================
// CONSTRUCTION & EQUALITY
// =============================================================================

/**
 * Create a frozen grid location.
 *
 * @throws ParseError if either coordinate is not a non-negative integer
 */
export function createLocation(row: number, col: number): Location {
  if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0) {
    throw new ParseError(`Location (${row},${col}) must use non-negative integers`);
  }
  return Object.freeze({ row, col });
}

/**
 * Two locations are equal when both coordinates match.
 */
export function locationsEqual(a: Location | null, b: Location | null): boolean {
  if (a === null || b === null) return a === b;
  return a.row === b.row && a.col === b.col;
}

// =============================================================================
// DISTANCE & TRAVEL TIME
// =============================================================================

/**
 * Number of grid steps between two cells when moving only along rows and
 * columns.
 *
 * @example
 * manhattanDistance(createLocation(1, 1), createLocation(6, 6)); // 10
 */
export function manhattanDistance(a: Location, b: Location): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

/**
 * Round to the nearest integer, sending exact halves to the even neighbour
 * (2.5 → 2, 3.5 → 4).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction < 0.5) return floor;
  if (fraction > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Ticks needed to travel from one cell to another at `speed` cells per tick.
 * Zero when the speed is zero or either end is unknown.
 *
 * @example
 * travelTime(createLocation(1, 1), createLocation(6, 6), 2); // 5
 * travelTime(createLocation(1, 1), createLocation(4, 4), 2); // 3
 */
export function travelTime(from: Location | null, to: Location | null, speed: number): number {
  if (from === null || to === null || speed === 0) {
    return 0;
  }
  return roundHalfEven(manhattanDistance(from, to) / speed);
}

// =============================================================================
// TEXT FORM
// =============================================================================

const LOCATION_PATTERN = /^(\d+),(\d+)$/;

/**
 * Parse the `row,col` token used in event scripts (no spaces allowed).
 *
 * @throws ParseError for anything else
 */
export function parseLocation(token: string): Location {
  const match = LOCATION_PATTERN.exec(token);
  if (!match) {
    throw new ParseError(`Malformed location "${token}", expected row,col`);
  }
  return createLocation(Number(match[1]), Number(match[2]));
}

/**
 * Render a location as `(row,col)`.
 */
export function formatLocation(location: Location | null): string {
  return location === null ? '(none)' : `(${location.row},${location.col})`;
}
