/**
 * Zero-capacity channel
 *
 * A send only succeeds while a receiver is already waiting, so values never
 * queue up: a producer that runs ahead of its consumer simply has its sends
 * refused. The tick scheduler relies on this to cap outstanding ticks at one.
 */
export class RendezvousChannel<T> implements AsyncIterable<T> {
  private receivers: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;

  /**
   * Hand `value` to a waiting receiver.
   * @returns false when nobody is waiting or the channel is closed
   */
  trySend(value: T): boolean {
    if (this.closed) return false;
    const receiver = this.receivers.shift();
    if (!receiver) return false;
    receiver({ value, done: false });
    return true;
  }

  /**
   * Wait for the next value. Resolves with `done: true` once closed.
   */
  recv(): Promise<IteratorResult<T, undefined>> {
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiting = this.receivers;
    this.receivers = [];
    for (const receiver of waiting) {
      receiver({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get hasReceiver(): boolean {
    return this.receivers.length > 0;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.recv();
      if (result.done) return;
      yield result.value;
    }
  }
}
