import { type Location, RiderStatus } from './types';
import { formatLocation } from '../utils/grid';

/**
 * A person asking to be driven from `origin` to `destination`.
 *
 * The dispatcher tracks riders by `id` only; the status here mirrors which
 * partition the rider ended up in and changes at most once.
 */
export class Rider {
  private _status: RiderStatus = RiderStatus.WAITING;

  constructor(
    readonly id: string,
    readonly origin: Location,
    readonly destination: Location,
    /** Ticks the rider waits before cancelling */
    readonly patience: number
  ) {}

  get status(): RiderStatus {
    return this._status;
  }

  /**
   * Give up waiting. No effect unless the rider is still waiting.
   */
  cancel(): void {
    if (this._status === RiderStatus.WAITING) {
      this._status = RiderStatus.CANCELLED;
    }
  }

  /**
   * Record a successful pickup. No effect unless the rider is still waiting.
   */
  markSatisfied(): void {
    if (this._status === RiderStatus.WAITING) {
      this._status = RiderStatus.SATISFIED;
    }
  }

  toString(): string {
    return `Rider ${this.id} @ ${formatLocation(this.origin)} -> ${formatLocation(this.destination)} ` +
      `[${this._status}, patience ${this.patience}]`;
  }
}
