import { describe, it, expect } from 'vitest';
import { createEventsFromInputs, parseEventScript, parseScriptLine } from '../src/utils/eventScript';
import type { SimulationEvent } from '../src/simulation/events';
import { Driver } from '../src/models/Driver';
import { EventKind } from '../src/models/types';
import { ParseError } from '../src/models/errors';

const driverOf = (event: SimulationEvent): Driver | undefined =>
  event.kind === EventKind.DRIVER_REQUEST ? event.driver : undefined;

const parseFailure = (script: string): ParseError | undefined => {
  try {
    parseEventScript(script);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  return undefined;
};

describe('event scripts', () => {
  describe('parseScriptLine', () => {
    it('should read a rider request', () => {
      expect(parseScriptLine('3 RiderRequest xyz 1,2 3,3 5')).toEqual({
        type: EventKind.RIDER_REQUEST,
        timestamp: 3,
        id: 'xyz',
        origin: { row: 1, col: 2 },
        destination: { row: 3, col: 3 },
        patience: 5
      });
    });

    it('should read a driver request with any whitespace between tokens', () => {
      expect(parseScriptLine('0\tDriverRequest   Sam 1,1 2')).toEqual({
        type: EventKind.DRIVER_REQUEST,
        timestamp: 0,
        id: 'Sam',
        location: { row: 1, col: 1 },
        speed: 2
      });
    });
  });

  describe('parseEventScript', () => {
    it('should build events in script order, skipping blanks and comments', () => {
      const events = parseEventScript([
        '# fleet',
        '0 DriverRequest Sam 1,1 2',
        '',
        '   ',
        '1 RiderRequest xyz 1,2 3,3 5'
      ].join('\n'));

      expect(events.map(event => [event.kind, event.timestamp])).toEqual([
        [EventKind.DRIVER_REQUEST, 0],
        [EventKind.RIDER_REQUEST, 1]
      ]);
      const [, rider] = events;
      expect(rider.kind === EventKind.RIDER_REQUEST && rider.rider.patience).toBe(5);
    });

    it('should accept Windows line endings', () => {
      expect(parseEventScript('0 DriverRequest Sam 1,1 2\r\n0 DriverRequest Ana 0,0 1\r\n')).toHaveLength(2);
    });

    it('should reuse one driver for repeated requests', () => {
      const events = parseEventScript('0 DriverRequest Sam 1,1 2\n9 DriverRequest Sam 1,1 2');

      expect(driverOf(events[0])).toBeInstanceOf(Driver);
      expect(driverOf(events[1])).toBe(driverOf(events[0]));
    });

    it('should report the line number of a bad token count', () => {
      const error = parseFailure('0 DriverRequest Sam 1,1 2\n\n3 RiderRequest a 1,1 2,2');

      expect(error?.message).toBe('Line 3: RiderRequest expects 6 tokens, got 5');
      expect(error?.line).toBe(3);
    });

    it('should reject unknown event types', () => {
      expect(parseFailure('1 Teleport x')?.message).toBe('Line 1: Unknown event type "Teleport"');
      expect(parseFailure('1 Pickup a b')?.message).toBe('Line 1: Unknown event type "Pickup"');
    });

    it('should reject non-integer numbers', () => {
      expect(parseFailure('-1 DriverRequest Sam 1,1 2')?.message).toBe(
        'Line 1: timestamp must be a non-negative integer, got "-1"'
      );
      expect(parseFailure('0 DriverRequest Sam 1,1 2.5')?.message).toBe(
        'Line 1: speed must be a non-negative integer, got "2.5"'
      );
      expect(parseFailure('0 RiderRequest a 1,1 2,2 soon')?.message).toBe(
        'Line 1: patience must be a non-negative integer, got "soon"'
      );
    });

    it('should reject malformed locations', () => {
      expect(parseFailure('0 DriverRequest Sam 1;1 2')?.message).toBe(
        'Line 1: Malformed location "1;1", expected row,col'
      );
    });

    it('should reject a duplicate rider id', () => {
      expect(parseFailure('0 RiderRequest a 1,1 2,2 3\n4 RiderRequest a 0,0 2,2 3')?.message).toBe(
        'Line 2: Duplicate rider id "a"'
      );
    });

    it('should reject a driver declared again with different details', () => {
      expect(parseFailure('0 DriverRequest Sam 1,1 2\n5 DriverRequest Sam 1,1 3')?.message).toBe(
        'Line 2: Driver "Sam" is declared again with a different location or speed'
      );
    });

    it('should return no events for an empty script', () => {
      expect(parseEventScript('\n# nothing yet\n')).toEqual([]);
    });
  });

  describe('createEventsFromInputs', () => {
    it('should build events from JSON inputs', () => {
      const events = createEventsFromInputs([
        { type: 'DriverRequest', timestamp: 0, id: 'Sam', location: { row: 1, col: 1 }, speed: 2 },
        {
          type: 'RiderRequest',
          timestamp: 1,
          id: 'xyz',
          origin: { row: 1, col: 1 },
          destination: { row: 6, col: 6 },
          patience: 4
        }
      ]);

      expect(events.map(event => event.kind)).toEqual([EventKind.DRIVER_REQUEST, EventKind.RIDER_REQUEST]);
      expect(driverOf(events[0])?.speed).toBe(2);
    });

    it('should name the index of an invalid input', () => {
      expect(() => createEventsFromInputs([
        { type: 'DriverRequest', timestamp: 0, id: 'Sam', location: { row: 1, col: 1 }, speed: 2 },
        { type: 'DriverRequest', timestamp: 0, id: 'Ana', location: { row: 1, col: 1 } }
      ])).toThrow('Event 1: speed: Required');
    });

    it('should apply the duplicate rider rule', () => {
      const rider = {
        type: 'RiderRequest',
        timestamp: 0,
        id: 'a',
        origin: { row: 0, col: 0 },
        destination: { row: 1, col: 1 },
        patience: 2
      };

      expect(() => createEventsFromInputs([rider, rider])).toThrow(new ParseError('Event 1: Duplicate rider id "a"'));
    });
  });
});
