import { logger } from '../application-logger';
import { MAX_EVENT_QUEUE_SIZE } from '../constants';

/**
 * Holds events recorded before a logger was registered. Events past the size limit are
 * dropped.
 */
export class BoundedEventQueue<T> {
  private readonly events: T[] = [];

  constructor(
    readonly name: string,
    private readonly maxSize: number = MAX_EVENT_QUEUE_SIZE,
  ) {}

  push(event: T): void {
    if (this.events.length < this.maxSize) {
      this.events.push(event);
    } else {
      logger.warn(`Dropping event for queue ${this.name} since the queue is full`);
    }
  }

  get length(): number {
    return this.events.length;
  }

  /** Removes and returns every queued event, oldest first. */
  flush(): T[] {
    return this.events.splice(0, this.events.length);
  }
}
