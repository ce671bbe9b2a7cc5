import { z } from 'zod';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * Lifecycle of a rider's request.
 * A rider leaves WAITING at most once and never returns to it.
 */
export enum RiderStatus {
  WAITING = 'waiting',
  CANCELLED = 'cancelled',
  SATISFIED = 'satisfied'
}

/**
 * Who an activity notification is about.
 */
export enum ActorKind {
  RIDER = 'rider',
  DRIVER = 'driver'
}

/**
 * What happened in an activity notification.
 */
export enum Action {
  REQUEST = 'request',
  CANCEL = 'cancel',
  PICKUP = 'pickup',
  DROPOFF = 'dropoff'
}

/**
 * The five kinds of simulation events.
 */
export enum EventKind {
  RIDER_REQUEST = 'RiderRequest',
  DRIVER_REQUEST = 'DriverRequest',
  CANCELLATION = 'Cancellation',
  PICKUP = 'Pickup',
  DROPOFF = 'Dropoff'
}

/**
 * How the dispatcher treats a driver once it has been matched.
 *
 * SHARED: The matched driver stays in the idle pool and a waiting rider
 *   handed to one driver stays eligible for the next. A driver can be
 *   double-booked; when that breaks a pickup or dropoff the run fails
 *   with a DriverStateError.
 *
 * RESERVE: The matched driver leaves the idle pool at match time and the
 *   rider is held for that driver. The driver rejoins the pool on its
 *   next request once it is idle again.
 */
export enum DispatchPolicy {
  SHARED = 'shared',
  RESERVE = 'reserve'
}

// =============================================================================
// LOCATION TYPES
// =============================================================================

/**
 * A cell on the simulation grid. Both coordinates are non-negative integers.
 */
export interface Location {
  readonly row: number;
  readonly col: number;
}

// =============================================================================
// MONITOR TYPES
// =============================================================================

/**
 * A single recorded activity.
 */
export interface Activity {
  timestamp: number;
  action: Action;
  id: string;
  location: Location | null;
}

/**
 * Aggregate statistics produced at the end of a run.
 */
export interface SimulationReport {
  /** Mean ticks between a rider's request and their pickup or cancellation */
  riderWaitTime: number;

  /** Mean grid distance driven per driver */
  driverTotalDistance: number;

  /** Mean distance driven with a rider aboard, over all drivers */
  driverRideDistance: number;
}

// =============================================================================
// DISPATCHER TYPES
// =============================================================================

/**
 * Identifiers held in each dispatcher partition, in partition order.
 */
export interface DispatcherSnapshot {
  waiting: string[];
  cancelled: string[];
  satisfied: string[];
  idle: string[];
  total: string[];
}

// =============================================================================
// SIMULATION CONFIGURATION
// =============================================================================

/**
 * Configuration for a simulation run.
 * Can be saved under an id and selected per request.
 */
export interface SimulationConfig {
  id: string;
  name: string;

  /** Whether a matched driver is reserved or stays in the idle pool */
  dispatchPolicy: DispatchPolicy;

  /** Log each applied event to the console */
  logEvents: boolean;

  /** Keep a textual trace of every applied event in the result */
  recordTrace: boolean;

  /**
   * Stop with an error after this many applied events (0 = no limit).
   * Caps the work a single HTTP request can trigger.
   */
  maxEvents: number;

  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// SIMULATION RESULT TYPES
// =============================================================================

/**
 * The stored outcome of one simulation run.
 */
export interface SimulationResult {
  id: string;
  report: SimulationReport;
  dispatcher: DispatcherSnapshot;

  metadata: {
    configId: string;
    dispatchPolicy: DispatchPolicy;
    initialEvents: number;
    eventsProcessed: number;
    finalTime: number;
    durationMs: number;
  };

  /** Present when the config has recordTrace enabled */
  trace?: string[];

  createdAt: Date;
}

// =============================================================================
// API REQUEST/RESPONSE TYPES
// =============================================================================

/**
 * A rider request given as JSON instead of a script line.
 */
export interface RiderRequestInput {
  type: EventKind.RIDER_REQUEST;
  timestamp: number;
  id: string;
  origin: Location;
  destination: Location;
  patience: number;
}

/**
 * A driver request given as JSON instead of a script line.
 */
export interface DriverRequestInput {
  type: EventKind.DRIVER_REQUEST;
  timestamp: number;
  id: string;
  location: Location;
  speed: number;
}

export type EventInput = RiderRequestInput | DriverRequestInput;

/**
 * Request body for POST /api/simulations.
 * Exactly one of `script` or `events` must be given.
 */
export interface SimulationRequest {
  script?: string;
  events?: EventInput[];
  configId?: string;
  configOverrides?: Partial<Pick<SimulationConfig, 'dispatchPolicy' | 'recordTrace' | 'maxEvents'>>;
}

/**
 * Response envelope for the simulation endpoints.
 */
export interface SimulationResponse {
  success: boolean;
  result?: SimulationResult;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// =============================================================================
// ZOD VALIDATION SCHEMAS
// =============================================================================

const tick = z.number().int().min(0);

export const LocationSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0)
});

export const RiderRequestInputSchema = z.object({
  type: z.literal(EventKind.RIDER_REQUEST),
  timestamp: tick,
  id: z.string().min(1),
  origin: LocationSchema,
  destination: LocationSchema,
  patience: tick
});

export const DriverRequestInputSchema = z.object({
  type: z.literal(EventKind.DRIVER_REQUEST),
  timestamp: tick,
  id: z.string().min(1),
  location: LocationSchema,
  speed: z.number().int().min(0)
});

export const EventInputSchema = z.discriminatedUnion('type', [
  RiderRequestInputSchema,
  DriverRequestInputSchema
]);

export const ConfigOverridesSchema = z.object({
  dispatchPolicy: z.nativeEnum(DispatchPolicy).optional(),
  recordTrace: z.boolean().optional(),
  maxEvents: z.number().int().min(0).optional()
});

export const SimulationRequestSchema = z.object({
  script: z.string().optional(),
  events: z.array(EventInputSchema).optional(),
  configId: z.string().optional(),
  configOverrides: ConfigOverridesSchema.optional()
}).refine(
  body => (body.script === undefined) !== (body.events === undefined),
  { message: 'Provide exactly one of "script" or "events"' }
);

export const SimulationConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  dispatchPolicy: z.nativeEnum(DispatchPolicy),
  logEvents: z.boolean(),
  recordTrace: z.boolean(),
  maxEvents: z.number().int().min(0),
  isDefault: z.boolean()
});

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

/**
 * Parse a dispatch policy name, case-insensitively.
 * Returns undefined for anything that is not a known policy.
 */
export function parseDispatchPolicy(value: string | undefined): DispatchPolicy | undefined {
  const normalized = value?.trim().toLowerCase();
  return Object.values(DispatchPolicy).find(policy => policy === normalized);
}
