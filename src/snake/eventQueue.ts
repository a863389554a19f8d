/**
 * Hand-off buffer between input capture and the game loop.
 *
 * push and drain are synchronous, so on the event loop each call is a whole
 * critical section: a drain takes every event pushed before it and nothing
 * pushed after it.
 */
export class EventQueue<T> {
  private items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  /**
   * Take every buffered event, oldest first, and leave the queue empty
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }
}
