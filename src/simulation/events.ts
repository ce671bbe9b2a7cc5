/**
 * Simulation Events
 *
 * Every event is an immutable record tagged with its EventKind. Applying an
 * event reads and updates the dispatcher, tells the notification sink what
 * happened, and returns the follow-up events to schedule:
 *
 *   RiderRequest  → Pickup (if a driver was found) + Cancellation
 *   DriverRequest → Pickup (if a rider was waiting)
 *   Cancellation  → nothing
 *   Pickup        → Dropoff, or DriverRequest if the rider had cancelled
 *   Dropoff       → DriverRequest
 */

import { Action, ActorKind, EventKind } from '../models/types';
import { DriverStateError } from '../models/errors';
import type { Driver } from '../models/Driver';
import type { Rider } from '../models/Rider';
import type { NotificationSink } from '../monitor/Monitor';
import type { Dispatcher } from './Dispatcher';
import { formatLocation, locationsEqual } from '../utils/grid';

// =============================================================================
// EVENT TYPES
// =============================================================================

interface EventBase {
  readonly timestamp: number;
}

export interface RiderRequestEvent extends EventBase {
  readonly kind: EventKind.RIDER_REQUEST;
  readonly rider: Rider;
}

export interface DriverRequestEvent extends EventBase {
  readonly kind: EventKind.DRIVER_REQUEST;
  readonly driver: Driver;
}

export interface CancellationEvent extends EventBase {
  readonly kind: EventKind.CANCELLATION;
  readonly rider: Rider;
}

export interface PickupEvent extends EventBase {
  readonly kind: EventKind.PICKUP;
  readonly rider: Rider;
  readonly driver: Driver;
}

export interface DropoffEvent extends EventBase {
  readonly kind: EventKind.DROPOFF;
  readonly rider: Rider;
  readonly driver: Driver;
}

export type SimulationEvent =
  | RiderRequestEvent
  | DriverRequestEvent
  | CancellationEvent
  | PickupEvent
  | DropoffEvent;

// =============================================================================
// FACTORIES
// =============================================================================

export function riderRequest(timestamp: number, rider: Rider): RiderRequestEvent {
  const event: RiderRequestEvent = { kind: EventKind.RIDER_REQUEST, timestamp, rider };
  return Object.freeze(event);
}

export function driverRequest(timestamp: number, driver: Driver): DriverRequestEvent {
  const event: DriverRequestEvent = { kind: EventKind.DRIVER_REQUEST, timestamp, driver };
  return Object.freeze(event);
}

export function cancellation(timestamp: number, rider: Rider): CancellationEvent {
  const event: CancellationEvent = { kind: EventKind.CANCELLATION, timestamp, rider };
  return Object.freeze(event);
}

export function pickup(timestamp: number, rider: Rider, driver: Driver): PickupEvent {
  const event: PickupEvent = { kind: EventKind.PICKUP, timestamp, rider, driver };
  return Object.freeze(event);
}

export function dropoff(timestamp: number, rider: Rider, driver: Driver): DropoffEvent {
  const event: DropoffEvent = { kind: EventKind.DROPOFF, timestamp, rider, driver };
  return Object.freeze(event);
}

// =============================================================================
// APPLYING EVENTS
// =============================================================================

/**
 * Apply `event` and return the events it spawns, in scheduling order.
 *
 * @throws DriverStateError if a Pickup or Dropoff finds its driver heading
 *         somewhere else
 */
export function applyEvent(
  event: SimulationEvent,
  dispatcher: Dispatcher,
  sink: NotificationSink
): SimulationEvent[] {
  switch (event.kind) {
    case EventKind.RIDER_REQUEST:
      return applyRiderRequest(event, dispatcher, sink);
    case EventKind.DRIVER_REQUEST:
      return applyDriverRequest(event, dispatcher, sink);
    case EventKind.CANCELLATION:
      return applyCancellation(event, dispatcher, sink);
    case EventKind.PICKUP:
      return applyPickup(event, dispatcher, sink);
    case EventKind.DROPOFF:
      return applyDropoff(event, dispatcher, sink);
    default:
      return assertNever(event);
  }
}

/**
 * Look for a driver. A match starts the driver towards the rider; the
 * rider's cancellation is scheduled either way and becomes a no-op if the
 * pickup happens first.
 */
function applyRiderRequest(
  { timestamp, rider }: RiderRequestEvent,
  dispatcher: Dispatcher,
  sink: NotificationSink
): SimulationEvent[] {
  sink.notify(timestamp, ActorKind.RIDER, Action.REQUEST, rider.id, rider.origin);

  const events: SimulationEvent[] = [];
  const driver = dispatcher.requestDriver(rider);
  if (driver !== null) {
    const eta = driver.startDrive(rider.origin);
    events.push(pickup(timestamp + eta, rider, driver));
  }
  events.push(cancellation(timestamp + rider.patience, rider));
  return events;
}

function applyDriverRequest(
  { timestamp, driver }: DriverRequestEvent,
  dispatcher: Dispatcher,
  sink: NotificationSink
): SimulationEvent[] {
  sink.notify(timestamp, ActorKind.DRIVER, Action.REQUEST, driver.id, driver.location);

  const rider = dispatcher.requestRider(driver);
  if (rider === null) {
    return [];
  }
  const eta = driver.startDrive(rider.origin);
  return [pickup(timestamp + eta, rider, driver)];
}

/**
 * The cancellation is always reported; it only changes state if the rider
 * has not been picked up yet.
 */
function applyCancellation(
  { timestamp, rider }: CancellationEvent,
  dispatcher: Dispatcher,
  sink: NotificationSink
): SimulationEvent[] {
  sink.notify(timestamp, ActorKind.RIDER, Action.CANCEL, rider.id, rider.origin);

  if (!dispatcher.isSatisfied(rider.id)) {
    rider.cancel();
    dispatcher.cancelRide(rider);
  }
  return [];
}

function applyPickup(
  { timestamp, rider, driver }: PickupEvent,
  dispatcher: Dispatcher,
  sink: NotificationSink
): SimulationEvent[] {
  if (!locationsEqual(driver.destination, rider.origin)) {
    throw new DriverStateError(
      driver.id,
      `expected to be heading to ${formatLocation(rider.origin)} to collect ${rider.id}, ` +
        `but destination is ${formatLocation(driver.destination)}`
    );
  }

  driver.endDrive();
  sink.notify(timestamp, ActorKind.RIDER, Action.PICKUP, rider.id, rider.origin);
  sink.notify(timestamp, ActorKind.DRIVER, Action.PICKUP, driver.id, driver.location);

  if (dispatcher.isCancelled(rider.id)) {
    driver.becomeIdle();
    return [driverRequest(timestamp, driver)];
  }

  const duration = driver.startRide(rider);
  rider.markSatisfied();
  dispatcher.endSuccessfulRide(rider);
  return [dropoff(timestamp + duration, rider, driver)];
}

function applyDropoff(
  { timestamp, rider, driver }: DropoffEvent,
  dispatcher: Dispatcher,
  sink: NotificationSink
): SimulationEvent[] {
  if (!locationsEqual(driver.destination, rider.destination)) {
    throw new DriverStateError(
      driver.id,
      `expected to be carrying ${rider.id} to ${formatLocation(rider.destination)}, ` +
        `but destination is ${formatLocation(driver.destination)}`
    );
  }

  driver.endRide();
  sink.notify(timestamp, ActorKind.DRIVER, Action.DROPOFF, driver.id, driver.location);
  dispatcher.endSuccessfulRide(rider);
  return [driverRequest(timestamp, driver)];
}

function assertNever(event: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(event)}`);
}

// =============================================================================
// DESCRIPTIONS
// =============================================================================

/**
 * One-line description for traces and logs.
 *
 * @example
 * describeEvent(riderRequest(3, rider));
 * // "3 -- Rider xyz @ (1,2) -> (3,3) [waiting, patience 3]: request a driver"
 */
export function describeEvent(event: SimulationEvent): string {
  switch (event.kind) {
    case EventKind.RIDER_REQUEST:
      return `${event.timestamp} -- ${event.rider}: request a driver`;
    case EventKind.DRIVER_REQUEST:
      return `${event.timestamp} -- ${event.driver}: request a rider`;
    case EventKind.CANCELLATION:
      return `${event.timestamp} -- ${event.rider}: cancellation`;
    case EventKind.PICKUP:
      return `${event.timestamp} -- ${event.driver} -- ${event.rider}: pickup`;
    case EventKind.DROPOFF:
      return `${event.timestamp} -- ${event.driver} -- ${event.rider}: dropoff`;
    default:
      return assertNever(event);
  }
}
