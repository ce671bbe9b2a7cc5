import { describe, it, expect, beforeEach } from 'vitest';
import { Monitor } from '../src/monitor/Monitor';
import { Action, ActorKind } from '../src/models/types';
import { InsufficientDataError } from '../src/models/errors';
import { at } from './factories';

const { RIDER, DRIVER } = ActorKind;
const { REQUEST, CANCEL, PICKUP, DROPOFF } = Action;

describe('Monitor', () => {
  let monitor: Monitor;

  beforeEach(() => {
    monitor = new Monitor();
  });

  it('should report the basic single-ride statistics', () => {
    monitor.notify(0, DRIVER, REQUEST, 'abc', at(0, 0));
    monitor.notify(3, DRIVER, PICKUP, 'abc', at(1, 1));
    monitor.notify(6, DRIVER, DROPOFF, 'abc', at(5, 5));
    monitor.notify(0, RIDER, REQUEST, 'xyz', at(1, 1));
    monitor.notify(3, RIDER, PICKUP, 'xyz', at(1, 1));

    expect(monitor.report()).toEqual({
      riderWaitTime: 3,
      driverTotalDistance: 10,
      driverRideDistance: 8
    });
  });

  describe('with several actors', () => {
    beforeEach(() => {
      // ann waits 3, bo gives up after 8, cy is still waiting
      monitor.notify(2, RIDER, REQUEST, 'ann', at(2, 3));
      monitor.notify(5, RIDER, PICKUP, 'ann', at(2, 3));
      monitor.notify(1, RIDER, REQUEST, 'bo', at(1, 4));
      monitor.notify(9, RIDER, CANCEL, 'bo', at(1, 4));
      monitor.notify(4, RIDER, REQUEST, 'cy', at(7, 7));

      // d1 drives 5 to the pickup and 3 with a rider
      monitor.notify(0, DRIVER, REQUEST, 'd1', at(0, 0));
      monitor.notify(2, DRIVER, PICKUP, 'd1', at(2, 3));
      monitor.notify(4, DRIVER, DROPOFF, 'd1', at(4, 4));
      monitor.notify(4, DRIVER, REQUEST, 'd1', at(4, 4));

      // d2 drives 4 to the pickup and 6 with a rider
      monitor.notify(0, DRIVER, REQUEST, 'd2', at(1, 1));
      monitor.notify(2, DRIVER, PICKUP, 'd2', at(3, 3));
      monitor.notify(8, DRIVER, DROPOFF, 'd2', at(0, 0));

      // d3 never moves
      monitor.notify(6, DRIVER, REQUEST, 'd3', at(9, 9));
    });

    it('should average waits over riders with a second activity', () => {
      expect(monitor.report().riderWaitTime).toBe(5.5);
    });

    it('should average total distance over drivers that moved', () => {
      expect(monitor.report().driverTotalDistance).toBe(9);
    });

    it('should average ride distance over every driver', () => {
      expect(monitor.report().driverRideDistance).toBe(3);
    });

    it('should count the actors it has seen', () => {
      expect(monitor.activityCounts()).toEqual({ riders: 3, drivers: 3 });
    });

    it('should keep each history in notification order', () => {
      expect(monitor.historyOf(RIDER, 'bo')).toEqual([
        { timestamp: 1, action: REQUEST, id: 'bo', location: { row: 1, col: 4 } },
        { timestamp: 9, action: CANCEL, id: 'bo', location: { row: 1, col: 4 } }
      ]);
      expect(monitor.historyOf(DRIVER, 'd1').map(activity => activity.action)).toEqual([
        REQUEST,
        PICKUP,
        DROPOFF,
        REQUEST
      ]);
    });

    it('should return an empty history for unknown actors', () => {
      expect(monitor.historyOf(DRIVER, 'nobody')).toEqual([]);
    });
  });

  it('should skip legs with an unknown location', () => {
    monitor.notify(0, RIDER, REQUEST, 'r', at(0, 0));
    monitor.notify(1, RIDER, PICKUP, 'r', at(0, 0));
    monitor.notify(0, DRIVER, REQUEST, 'd', at(0, 0));
    monitor.notify(1, DRIVER, PICKUP, 'd', null);
    monitor.notify(2, DRIVER, DROPOFF, 'd', at(3, 3));

    expect(monitor.report()).toEqual({
      riderWaitTime: 1,
      driverTotalDistance: 0,
      driverRideDistance: 0
    });
  });

  describe('insufficient data', () => {
    it('should refuse to report on an empty run', () => {
      expect(() => monitor.report()).toThrow(InsufficientDataError);
      expect(() => monitor.report()).toThrow('No qualifying activity recorded for riderWaitTime');
    });

    it('should refuse to average distance when no driver has moved', () => {
      monitor.notify(0, RIDER, REQUEST, 'r', at(0, 0));
      monitor.notify(4, RIDER, CANCEL, 'r', at(0, 0));
      monitor.notify(0, DRIVER, REQUEST, 'd', at(5, 5));

      let caught: unknown;
      try {
        monitor.report();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientDataError);
      expect(caught instanceof InsufficientDataError && caught.statistic).toBe('driverTotalDistance');
    });
  });
});
