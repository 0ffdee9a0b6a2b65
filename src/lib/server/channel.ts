import type { EventSink, EventSource, TaskEvent } from "../shared/types.js";

/**
 * Unbounded, order-preserving queue between a running task and whoever displays it.
 *
 * Producers call {@link send}; the consumer polls {@link drain}. Neither side ever waits
 * on the other. Events from all five operations may share one channel and are told
 * apart by their `channel` tag.
 */
export class EventChannel implements EventSink, EventSource {
  private queue: TaskEvent[] = [];

  send(event: TaskEvent): void {
    this.queue.push(event);
  }

  /** Take every queued event, oldest first. Returns an empty array when nothing is queued. */
  drain(): TaskEvent[] {
    if (this.queue.length === 0) return [];
    const events = this.queue;
    this.queue = [];
    return events;
  }

  get size(): number {
    return this.queue.length;
  }
}
