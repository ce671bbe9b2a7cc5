import { EmptyQueueError } from '../models/errors';

/**
 * Anything with a simulation timestamp can be queued.
 */
export interface Timestamped {
  readonly timestamp: number;
}

interface QueueEntry<T> {
  item: T;
  /** Insertion sequence, breaks ties between equal timestamps */
  order: number;
}

/**
 * Binary-heap priority queue ordered by timestamp.
 *
 * Items with equal timestamps come out in the order they were added, so a
 * run is reproducible from the same initial events.
 *
 * @example
 * const queue = new EventQueue<SimulationEvent>();
 * queue.add(event);
 * while (!queue.isEmpty()) {
 *   const next = queue.removeMin();
 * }
 */
export class EventQueue<T extends Timestamped> {
  private heap: QueueEntry<T>[] = [];
  private nextOrder = 0;

  /**
   * Insert an item. O(log n).
   */
  add(item: T): void {
    this.heap.push({ item, order: this.nextOrder++ });
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the item with the smallest timestamp. O(log n).
   *
   * @throws EmptyQueueError if the queue is empty
   */
  removeMin(): T {
    const root = this.heap[0];
    if (root === undefined) {
      throw new EmptyQueueError();
    }

    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return root.item;
  }

  /**
   * The next item to be removed, without removing it.
   */
  peek(): T | undefined {
    return this.heap[0]?.item;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  get size(): number {
    return this.heap.length;
  }

  // ===========================================================================
  // HEAP MAINTENANCE
  // ===========================================================================

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.compare(index, parent) >= 0) {
        break;
      }
      this.swap(index, parent);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.heap.length;

    for (;;) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;

      if (left < length && this.compare(left, smallest) < 0) {
        smallest = left;
      }
      if (right < length && this.compare(right, smallest) < 0) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }

      this.swap(index, smallest);
      index = smallest;
    }
  }

  /**
   * Earlier timestamp first, then earlier insertion.
   */
  private compare(i: number, j: number): number {
    const a = this.heap[i];
    const b = this.heap[j];
    const dt = a.item.timestamp - b.item.timestamp;
    return dt !== 0 ? dt : a.order - b.order;
  }

  private swap(i: number, j: number): void {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }
}
