import type { Location } from './types';
import { DriverStateError } from './errors';
import type { Rider } from './Rider';
import { formatLocation, travelTime } from '../utils/grid';

/**
 * A driver moving around the grid.
 *
 * State transitions:
 *
 *   idle ──startDrive──▶ en route to pickup ──endDrive──▶ at pickup
 *   at pickup ──startRide──▶ en route to dropoff ──endRide──▶ idle
 *   at pickup ──becomeIdle──▶ idle            (rider had cancelled)
 *
 * While en route the driver has a destination and is not idle; an idle
 * driver never has a destination.
 */
export class Driver {
  private _location: Location;
  private _destination: Location | null = null;
  private _isIdle = true;

  constructor(
    readonly id: string,
    location: Location,
    /** Grid cells covered per tick; 0 means every trip is instantaneous */
    readonly speed: number
  ) {
    this._location = location;
  }

  get location(): Location {
    return this._location;
  }

  get destination(): Location | null {
    return this._destination;
  }

  get isIdle(): boolean {
    return this._isIdle;
  }

  /**
   * Ticks this driver needs to reach `destination` from where it is now.
   */
  getTravelTime(destination: Location): number {
    return travelTime(this._location, destination, this.speed);
  }

  /**
   * Head towards `location` (a rider's origin).
   *
   * @returns Ticks until arrival
   */
  startDrive(location: Location): number {
    this._isIdle = false;
    this._destination = location;
    return this.getTravelTime(location);
  }

  /**
   * Arrive at the pickup. The driver stays busy until it starts a ride or
   * is released with becomeIdle().
   */
  endDrive(): void {
    this._location = this.requireDestination('end a drive');
    this._destination = null;
  }

  /**
   * Carry `rider` to their destination.
   *
   * @returns Ticks until dropoff
   */
  startRide(rider: Rider): number {
    this._isIdle = false;
    this._destination = rider.destination;
    return this.getTravelTime(rider.destination);
  }

  /**
   * Arrive at the rider's destination and become idle.
   */
  endRide(): void {
    this._location = this.requireDestination('end a ride');
    this._destination = null;
    this._isIdle = true;
  }

  /**
   * Become available again without moving.
   */
  becomeIdle(): void {
    this._destination = null;
    this._isIdle = true;
  }

  toString(): string {
    return `Driver ${this.id} @ ${formatLocation(this._location)} (speed ${this.speed})`;
  }

  private requireDestination(operation: string): Location {
    if (this._destination === null) {
      throw new DriverStateError(this.id, `cannot ${operation} without a destination`);
    }
    return this._destination;
  }
}
