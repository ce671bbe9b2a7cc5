/**
 * Dispatcher - Rider and Driver Bookkeeping
 *
 * Keeps the partitions that describe where every participant stands:
 *
 * - waiting:   riders who requested and were neither picked up nor cancelled
 *              (ordered, oldest first)
 * - cancelled: riders who gave up
 * - satisfied: riders who were picked up
 * - idle:      drivers eligible for matching (ordered by registration)
 * - total:     every driver that ever requested a rider
 *
 * Everything is keyed by identifier, never by object identity, so two
 * references to the same logical rider always land in the same partition.
 *
 * Matching is greedy: a requesting rider gets the idle driver that can reach
 * them soonest; a requesting driver gets the longest-waiting rider.
 */

import { DispatchPolicy, type DispatcherSnapshot } from '../models/types';
import type { Driver } from '../models/Driver';
import type { Rider } from '../models/Rider';

export class Dispatcher {
  private readonly waiting = new Map<string, Rider>();
  private readonly cancelled = new Set<string>();
  private readonly satisfied = new Set<string>();
  private readonly idle = new Map<string, Driver>();
  private readonly total = new Map<string, Driver>();

  /** RESERVE only: waiting riders already promised to a driver */
  private readonly assigned = new Set<string>();

  constructor(readonly policy: DispatchPolicy = DispatchPolicy.RESERVE) {}

  // ===========================================================================
  // MATCHING
  // ===========================================================================

  /**
   * Put `rider` on the waiting list and find the idle driver with the
   * shortest travel time to the rider's origin. Ties go to the driver that
   * has been in the idle pool longest.
   *
   * The caller is responsible for starting the driver's drive. Under
   * RESERVE the driver is also taken out of the idle pool here.
   *
   * @returns The chosen driver, or null when no driver is idle
   */
  requestDriver(rider: Rider): Driver | null {
    this.waiting.set(rider.id, rider);

    let best: Driver | null = null;
    let bestTime = Infinity;
    for (const driver of this.idle.values()) {
      const time = driver.getTravelTime(rider.origin);
      if (time < bestTime) {
        best = driver;
        bestTime = time;
      }
    }

    if (best !== null && this.policy === DispatchPolicy.RESERVE) {
      this.idle.delete(best.id);
      this.assigned.add(rider.id);
    }

    return best;
  }

  /**
   * Register `driver` on its first request and hand it the longest-waiting
   * rider. The rider stays on the waiting list until it is picked up or
   * cancels.
   *
   * Under RESERVE a known driver that is idle again rejoins the idle pool,
   * a driver that is still busy gets nothing, riders already promised to
   * another driver are skipped, and a driver that gets a rider leaves the
   * idle pool.
   *
   * @returns The rider to collect, or null when nobody is waiting
   */
  requestRider(driver: Driver): Rider | null {
    const isNew = !this.total.has(driver.id);
    if (isNew) {
      this.total.set(driver.id, driver);
    }

    if (this.policy === DispatchPolicy.SHARED) {
      if (isNew && driver.isIdle) {
        this.idle.set(driver.id, driver);
      }
      const head = this.waiting.values().next();
      return head.done ? null : head.value;
    }

    if (!driver.isIdle) {
      return null;
    }
    this.idle.set(driver.id, driver);

    for (const rider of this.waiting.values()) {
      if (!this.assigned.has(rider.id)) {
        this.assigned.add(rider.id);
        this.idle.delete(driver.id);
        return rider;
      }
    }
    return null;
  }

  // ===========================================================================
  // RIDE OUTCOMES
  // ===========================================================================

  /**
   * Move a waiting rider to the cancelled partition. No-op otherwise.
   */
  cancelRide(rider: Rider): void {
    if (this.waiting.delete(rider.id)) {
      this.assigned.delete(rider.id);
      this.cancelled.add(rider.id);
    }
  }

  /**
   * Move a waiting rider to the satisfied partition. No-op otherwise.
   */
  endSuccessfulRide(rider: Rider): void {
    if (this.waiting.delete(rider.id)) {
      this.assigned.delete(rider.id);
      this.satisfied.add(rider.id);
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  isWaiting(riderId: string): boolean {
    return this.waiting.has(riderId);
  }

  isCancelled(riderId: string): boolean {
    return this.cancelled.has(riderId);
  }

  isSatisfied(riderId: string): boolean {
    return this.satisfied.has(riderId);
  }

  isIdle(driverId: string): boolean {
    return this.idle.has(driverId);
  }

  isRegistered(driverId: string): boolean {
    return this.total.has(driverId);
  }

  snapshot(): DispatcherSnapshot {
    return {
      waiting: [...this.waiting.keys()],
      cancelled: [...this.cancelled],
      satisfied: [...this.satisfied],
      idle: [...this.idle.keys()],
      total: [...this.total.keys()]
    };
  }
}
