/**
 * Simulation - Event Loop
 *
 * Replays events in timestamp order against one dispatcher and one
 * notification sink. Each applied event may spawn follow-up events, which go
 * straight back into the queue; the run ends when the queue is empty.
 *
 * A Simulation owns its queue, dispatcher and sink. Create a fresh instance
 * per run.
 */

import type { SimulationConfig, SimulationReport } from '../models/types';
import { EventLimitError } from '../models/errors';
import { Monitor, type NotificationSink, type Reporter } from '../monitor/Monitor';
import { DEFAULT_CONFIG } from '../config/config';
import { Dispatcher } from './Dispatcher';
import { EventQueue } from './EventQueue';
import { type SimulationEvent, applyEvent, describeEvent } from './events';

export class Simulation {
  readonly dispatcher: Dispatcher;
  private readonly queue = new EventQueue<SimulationEvent>();
  private readonly sink: NotificationSink & Reporter;
  private readonly config: SimulationConfig;
  private readonly trace: string[] = [];
  private processed = 0;
  private time = 0;

  constructor(config?: SimulationConfig, sink?: NotificationSink & Reporter) {
    this.config = config || DEFAULT_CONFIG;
    this.sink = sink || new Monitor();
    this.dispatcher = new Dispatcher(this.config.dispatchPolicy);
  }

  // ===========================================================================
  // MAIN ENTRY POINT
  // ===========================================================================

  /**
   * Schedule `initialEvents`, apply everything until the queue drains and
   * return the sink's report.
   *
   * @throws InsufficientDataError from the sink if nothing qualified for a
   *         statistic
   */
  run(initialEvents: SimulationEvent[]): SimulationReport {
    this.schedule(initialEvents);

    if (this.config.logEvents) {
      console.log(`[Simulation] Starting run (${this.config.dispatchPolicy} dispatch):`);
      console.log(`  - ${initialEvents.length} initial events`);
    }

    this.drain();

    if (this.config.logEvents) {
      const snapshot = this.dispatcher.snapshot();
      console.log(`[Simulation] Finished at t=${this.time} after ${this.processed} events:`);
      console.log(`  - ${snapshot.satisfied.length} riders satisfied`);
      console.log(`  - ${snapshot.cancelled.length} riders cancelled`);
      console.log(`  - ${snapshot.waiting.length} riders still waiting`);
    }

    return this.sink.report();
  }

  // ===========================================================================
  // STEPPING
  // ===========================================================================

  schedule(events: SimulationEvent[]): void {
    for (const event of events) {
      this.queue.add(event);
    }
  }

  /**
   * Apply the next event and schedule whatever it spawns.
   *
   * @returns The spawned events, or null if the queue was already empty
   */
  step(): SimulationEvent[] | null {
    if (this.queue.isEmpty()) {
      return null;
    }

    const limit = this.config.maxEvents;
    if (limit > 0 && this.processed >= limit) {
      throw new EventLimitError(limit);
    }

    const event = this.queue.removeMin();
    this.time = event.timestamp;
    this.processed++;

    if (this.config.recordTrace || this.config.logEvents) {
      const line = describeEvent(event);
      if (this.config.recordTrace) this.trace.push(line);
      if (this.config.logEvents) console.log(`[Simulation] ${line}`);
    }

    const spawned = applyEvent(event, this.dispatcher, this.sink);
    this.schedule(spawned);
    return spawned;
  }

  /**
   * Apply events until none are left.
   *
   * @returns How many events were applied by this call
   */
  drain(): number {
    let applied = 0;
    while (this.step() !== null) {
      applied++;
    }
    return applied;
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  get pendingEvents(): number {
    return this.queue.size;
  }

  /** Next event to be applied, if any */
  peekNext(): SimulationEvent | undefined {
    return this.queue.peek();
  }

  get eventsProcessed(): number {
    return this.processed;
  }

  /** Timestamp of the last applied event */
  get currentTime(): number {
    return this.time;
  }

  getTrace(): string[] {
    return [...this.trace];
  }
}
