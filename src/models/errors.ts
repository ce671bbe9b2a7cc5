/**
 * Error conditions raised by the simulator.
 *
 * Every error carries a stable `code` so the HTTP layer and the CLI can
 * report it in the same `{ code, message }` envelope used for validation
 * failures. Dispatcher operations never throw: "no match" is a null return.
 */

export abstract class SimulationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when removing from an event queue that has no events left.
 * The simulation loop checks emptiness first, so this only surfaces on
 * direct misuse of the queue.
 */
export class EmptyQueueError extends SimulationError {
  readonly code = 'EMPTY_QUEUE';

  constructor() {
    super('Cannot remove an event from an empty queue');
  }
}

/**
 * Raised for malformed event-script lines or event inputs.
 * `line` is 1-based and only set when parsing a script.
 */
export class ParseError extends SimulationError {
  readonly code = 'PARSE_ERROR';

  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
  }
}

/**
 * Raised when a Pickup or Dropoff finds its driver in a state the event
 * could not have been scheduled from (e.g. a double-booked driver).
 */
export class DriverStateError extends SimulationError {
  readonly code = 'DRIVER_STATE';

  constructor(readonly driverId: string, message: string) {
    super(`Driver ${driverId}: ${message}`);
  }
}

/**
 * Raised by the monitor when a statistic has nothing to average over.
 */
export class InsufficientDataError extends SimulationError {
  readonly code = 'INSUFFICIENT_DATA';

  constructor(readonly statistic: string) {
    super(`No qualifying activity recorded for ${statistic}`);
  }
}

/**
 * Raised when a run applies more events than its configured limit allows.
 */
export class EventLimitError extends SimulationError {
  readonly code = 'EVENT_LIMIT';

  constructor(readonly limit: number) {
    super(`Simulation stopped after applying ${limit} events`);
  }
}
