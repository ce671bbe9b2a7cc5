/**
 * Monitor - Activity Recording and Statistics
 *
 * The simulation notifies the monitor of every observable step (requests,
 * cancellations, pickups, dropoffs). The monitor keeps a per-actor history
 * and turns it into averages at the end of a run.
 */

import { Action, type Activity, ActorKind, type Location, type SimulationReport } from '../models/types';
import { InsufficientDataError } from '../models/errors';
import { manhattanDistance } from '../utils/grid';

// =============================================================================
// SINK INTERFACES
// =============================================================================

/**
 * Receives one call per observable transition, in the order they happen.
 */
export interface NotificationSink {
  notify(
    timestamp: number,
    actor: ActorKind,
    action: Action,
    id: string,
    location: Location | null
  ): void;
}

/**
 * Summarises what a sink has seen.
 */
export interface Reporter {
  report(): SimulationReport;
}

// =============================================================================
// MONITOR
// =============================================================================

export class Monitor implements NotificationSink, Reporter {
  private readonly activities: Record<ActorKind, Map<string, Activity[]>> = {
    [ActorKind.RIDER]: new Map(),
    [ActorKind.DRIVER]: new Map()
  };

  notify(
    timestamp: number,
    actor: ActorKind,
    action: Action,
    id: string,
    location: Location | null
  ): void {
    const byId = this.activities[actor];
    const history = byId.get(id) ?? [];
    history.push({ timestamp, action, id, location });
    byId.set(id, history);
  }

  /**
   * Averages over everything recorded so far.
   *
   * @throws InsufficientDataError if any statistic has nothing to average
   */
  report(): SimulationReport {
    return {
      riderWaitTime: this.averageWaitTime(),
      driverTotalDistance: this.averageTotalDistance(),
      driverRideDistance: this.averageRideDistance()
    };
  }

  /**
   * Recorded history for one actor, oldest first.
   */
  historyOf(actor: ActorKind, id: string): readonly Activity[] {
    return this.activities[actor].get(id) ?? [];
  }

  activityCounts(): { riders: number; drivers: number } {
    return {
      riders: this.activities[ActorKind.RIDER].size,
      drivers: this.activities[ActorKind.DRIVER].size
    };
  }

  // ===========================================================================
  // STATISTICS
  // ===========================================================================

  /**
   * A rider's wait is the gap between their first activity (the request)
   * and their second (pickup or cancellation). Riders with a single
   * activity are still waiting and are left out.
   */
  private averageWaitTime(): number {
    let total = 0;
    let count = 0;
    for (const history of this.activities[ActorKind.RIDER].values()) {
      if (history.length >= 2) {
        total += history[1].timestamp - history[0].timestamp;
        count++;
      }
    }
    return this.average(total, count, 'riderWaitTime');
  }

  /**
   * Distance between each pair of consecutive driver activities, averaged
   * over drivers that have moved at least once.
   */
  private averageTotalDistance(): number {
    let total = 0;
    let count = 0;
    for (const history of this.activities[ActorKind.DRIVER].values()) {
      if (history.length >= 2) {
        total += this.sumLegs(history, () => true);
        count++;
      }
    }
    return this.average(total, count, 'driverTotalDistance');
  }

  /**
   * Pickup-to-dropoff distance, averaged over every driver seen, including
   * those who never carried anyone.
   */
  private averageRideDistance(): number {
    let total = 0;
    const drivers = this.activities[ActorKind.DRIVER];
    for (const history of drivers.values()) {
      total += this.sumLegs(
        history,
        (from, to) => from.action === Action.PICKUP && to.action === Action.DROPOFF
      );
    }
    return this.average(total, drivers.size, 'driverRideDistance');
  }

  private sumLegs(
    history: Activity[],
    include: (from: Activity, to: Activity) => boolean
  ): number {
    let distance = 0;
    for (let i = 0; i < history.length - 1; i++) {
      const from = history[i];
      const to = history[i + 1];
      if (from.location !== null && to.location !== null && include(from, to)) {
        distance += manhattanDistance(from.location, to.location);
      }
    }
    return distance;
  }

  private average(total: number, count: number, statistic: string): number {
    if (count === 0) {
      throw new InsufficientDataError(statistic);
    }
    return total / count;
  }
}
