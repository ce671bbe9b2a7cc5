/**
 * Event Script Parsing
 *
 * Turns the plain-text event script into the initial event list:
 *
 *   <timestamp> RiderRequest <id> <row,col origin> <row,col destination> <patience>
 *   <timestamp> DriverRequest <id> <row,col location> <speed>
 *
 * Blank lines and lines starting with `#` are skipped. The same rules apply
 * to the JSON event inputs accepted by the HTTP API.
 */

import type { ZodError } from 'zod';
import {
  type DriverRequestInput,
  type EventInput,
  EventInputSchema,
  EventKind,
  type Location,
  type RiderRequestInput
} from '../models/types';
import { ParseError } from '../models/errors';
import { Driver } from '../models/Driver';
import { Rider } from '../models/Rider';
import { type SimulationEvent, driverRequest, riderRequest } from '../simulation/events';
import { createLocation, locationsEqual, parseLocation } from './grid';

// =============================================================================
// SCRIPT PARSING
// =============================================================================

const TOKEN_COUNTS = new Map<string, number>([
  [EventKind.RIDER_REQUEST, 6],
  [EventKind.DRIVER_REQUEST, 5]
]);

/**
 * Parse a whole event script.
 *
 * @throws ParseError naming the first offending line
 */
export function parseEventScript(text: string): SimulationEvent[] {
  const builder = new EventBuilder();

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const lineNumber = index + 1;
    try {
      builder.add(parseScriptLine(line));
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(error.message, lineNumber);
      }
      throw error;
    }
  });

  return builder.events;
}

/**
 * Parse one non-blank, non-comment script line into an event input.
 */
export function parseScriptLine(line: string): EventInput {
  const tokens = line.split(/\s+/);
  const [timestampToken, type] = tokens;

  const expected = TOKEN_COUNTS.get(type);
  if (expected === undefined) {
    throw new ParseError(`Unknown event type "${type ?? ''}"`);
  }
  if (tokens.length !== expected) {
    throw new ParseError(`${type} expects ${expected} tokens, got ${tokens.length}`);
  }

  const timestamp = parseInteger(timestampToken, 'timestamp');

  if (type === EventKind.RIDER_REQUEST) {
    return validate({
      type: EventKind.RIDER_REQUEST,
      timestamp,
      id: tokens[2],
      origin: parseLocation(tokens[3]),
      destination: parseLocation(tokens[4]),
      patience: parseInteger(tokens[5], 'patience')
    });
  }

  return validate({
    type: EventKind.DRIVER_REQUEST,
    timestamp,
    id: tokens[2],
    location: parseLocation(tokens[3]),
    speed: parseInteger(tokens[4], 'speed')
  });
}

function parseInteger(token: string, field: string): number {
  if (!/^\d+$/.test(token)) {
    throw new ParseError(`${field} must be a non-negative integer, got "${token}"`);
  }
  return Number(token);
}

// =============================================================================
// JSON INPUTS
// =============================================================================

/**
 * Build the initial event list from JSON event inputs.
 *
 * @throws ParseError naming the first offending input (0-based index)
 */
export function createEventsFromInputs(inputs: unknown[]): SimulationEvent[] {
  const builder = new EventBuilder();

  inputs.forEach((input, index) => {
    try {
      builder.add(validate(input));
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Event ${index}: ${error.message}`);
      }
      throw error;
    }
  });

  return builder.events;
}

function validate(input: unknown): EventInput {
  const parsed = EventInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ParseError(formatZodError(parsed.error));
  }
  return parsed.data;
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// =============================================================================
// EVENT CONSTRUCTION
// =============================================================================

/**
 * Creates riders and drivers as their requests are read.
 *
 * Rider ids must be unique. A driver id may appear in several requests;
 * every request then refers to the same Driver, so they must agree on its
 * starting location and speed.
 */
class EventBuilder {
  readonly events: SimulationEvent[] = [];
  private readonly riderIds = new Set<string>();
  private readonly drivers = new Map<string, Driver>();

  add(input: EventInput): void {
    if (input.type === EventKind.RIDER_REQUEST) {
      this.addRider(input);
    } else {
      this.addDriver(input);
    }
  }

  private addRider(input: RiderRequestInput): void {
    if (this.riderIds.has(input.id)) {
      throw new ParseError(`Duplicate rider id "${input.id}"`);
    }
    this.riderIds.add(input.id);

    const rider = new Rider(input.id, toLocation(input.origin), toLocation(input.destination), input.patience);
    this.events.push(riderRequest(input.timestamp, rider));
  }

  private addDriver(input: DriverRequestInput): void {
    const location = toLocation(input.location);
    let driver = this.drivers.get(input.id);

    if (driver === undefined) {
      driver = new Driver(input.id, location, input.speed);
      this.drivers.set(input.id, driver);
    } else if (!locationsEqual(driver.location, location) || driver.speed !== input.speed) {
      throw new ParseError(`Driver "${input.id}" is declared again with a different location or speed`);
    }

    this.events.push(driverRequest(input.timestamp, driver));
  }
}

function toLocation({ row, col }: Location): Location {
  return createLocation(row, col);
}
